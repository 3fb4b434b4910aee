import type { QAPair } from "../types";
import type { CritiqueLoopController, QuestionResult } from "./critiqueLoop";
import type { SessionStateStore } from "./session";
import { COACHING_POLICY } from "./policy";
import { AuditLog } from "./auditLog";
import { SessionPreconditionError } from "./errors";

export type FollowUpOutcome =
  | { status: 'ANSWERED'; depth: number; original: QAPair; result: QuestionResult }
  | { status: 'MAX_DEPTH_REACHED'; depth: number; maxDepth: number; message: string };

/**
 * Chains follow-up questions under the current top-level question, up to
 * `maxDepth`. Depth lives on the session; only the orchestrator resets it.
 */
export class FollowUpController {
  private readonly log: AuditLog;

  constructor(
    private readonly loop: CritiqueLoopController,
    private readonly maxDepth: number = COACHING_POLICY.FOLLOW_UP.MAX_DEPTH,
    log?: AuditLog,
  ) {
    this.log = log ?? new AuditLog();
  }

  public async handle(store: SessionStateStore, followUpQuestion: string): Promise<FollowUpOutcome> {
    const session = store.requireSession();
    const { questionsAsked, answersGiven } = session.practice;

    if (questionsAsked.length === 0 || answersGiven.length === 0) {
      throw new SessionPreconditionError('NO_PREVIOUS_QUESTION', "No previous question to follow up on.");
    }

    const depth = session.followUpDepth;
    if (depth >= this.maxDepth) {
      this.log.write('FOLLOW-UP', `Maximum follow-up depth (${this.maxDepth}) reached.`);
      return {
        status: 'MAX_DEPTH_REACHED',
        depth,
        maxDepth: this.maxDepth,
        message: "Maximum follow-up depth reached",
      };
    }

    const original: QAPair = {
      question: questionsAsked[questionsAsked.length - 1],
      answer: answersGiven[answersGiven.length - 1],
    };

    store.addFollowUp(followUpQuestion);
    this.log.write('FOLLOW-UP', `Follow-up ${depth + 1}/${this.maxDepth}: ${followUpQuestion.slice(0, 50)}`);

    const result = await this.loop.processFollowUp(followUpQuestion, original, {
      mode: session.mode,
      job: session.job,
    });

    store.addFollowUpAnswer(result.answer);
    store.addToConversation('candidate', followUpQuestion);
    store.addToConversation('coach', result.answer);

    return { status: 'ANSWERED', depth: depth + 1, original, result };
  }
}
