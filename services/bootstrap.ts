import dotenv from "dotenv";
import { loadConfig } from "./config";
import type { CoachConfig } from "./config";
import { GeminiCoach } from "./gemini";
import type { ModelClient } from "./gemini";
import { GeminiSearch } from "./research";
import { InterviewOrchestrator } from "./orchestrator";
import type { OrchestratorDeps } from "./orchestrator";

export interface CreateCoachOptions extends Partial<Pick<OrchestratorDeps, 'store' | 'profile' | 'log' | 'now' | 'random'>> {
  env?: Record<string, string | undefined>;
  client?: ModelClient;
}

/**
 * Wires the Gemini-backed collaborators into an orchestrator. Without an
 * explicit `env`, `.env` is loaded into `process.env` first.
 */
export const createCoach = (options: CreateCoachOptions = {}): { coach: InterviewOrchestrator; config: CoachConfig } => {
  const { env, client, ...deps } = options;
  if (!env) dotenv.config();

  const config = loadConfig(env ?? process.env);
  const coach = new InterviewOrchestrator({
    ...deps,
    model: new GeminiCoach(config, client),
    search: new GeminiSearch(config, client),
    settings: config,
  });

  return { coach, config };
};
