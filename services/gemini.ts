import { GoogleGenAI, Type } from "@google/genai";
import type { Candidate, GenerateContentParameters, Schema } from "@google/genai";
import type { AnswerBrief, CoachingModel, MockQuestionRequest } from "./collaborators";
import { COACHING_POLICY } from "./policy";

/** The slice of the Gemini SDK this project calls. `GoogleGenAI#models` satisfies it. */
export interface ModelClient {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string; candidates?: Candidate[] }>;
}

export interface GeminiSettings {
  apiKey: string | null;
  model: string;
  temperature: number;
}

export const createModelClient = (apiKey: string | null): ModelClient => {
  if (!apiKey) throw new Error("GEMINI_API_KEY not found in environment");
  return new GoogleGenAI({ apiKey }).models;
};

// --- Schemas ---

const critiqueSchema: Schema = {
  type: Type.OBJECT,
  properties: {
    scores: {
      type: Type.OBJECT,
      properties: {
        authenticity: { type: Type.NUMBER, description: "0-10. Sounds genuine and grounded in real experience." },
        relevance: { type: Type.NUMBER, description: "0-10. Directly answers the question." },
        structure: { type: Type.NUMBER, description: "0-10. Organized and easy to follow." },
        specificity: { type: Type.NUMBER, description: "0-10. Concrete details and examples." },
        impact: { type: Type.NUMBER, description: "0-10. Demonstrates value and results." },
        length: { type: Type.NUMBER, description: "0-10. Fits 2-3 minutes when spoken." },
      },
      required: ["authenticity", "relevance", "structure", "specificity", "impact", "length"],
    },
    overall: { type: Type.NUMBER, description: "0-10. Average of the scores." },
    strengths: { type: Type.ARRAY, items: { type: Type.STRING } },
    improvements: { type: Type.ARRAY, items: { type: Type.STRING } },
    factCheck: { type: Type.STRING, description: "Does the answer agree with the CV?" },
  },
  required: ["scores", "overall", "strengths", "improvements"],
};

const keyPointsSchema: Schema = {
  type: Type.OBJECT,
  properties: {
    keyPoints: { type: Type.ARRAY, items: { type: Type.STRING }, description: "3-5 messages to emphasize." },
    deliveryTips: { type: Type.ARRAY, items: { type: Type.STRING }, description: "3-4 tips on tone, pacing and presence." },
  },
  required: ["keyPoints", "deliveryTips"],
};

const followUpSchema: Schema = {
  type: Type.OBJECT,
  properties: {
    followUps: {
      type: Type.ARRAY,
      items: {
        type: Type.OBJECT,
        properties: {
          question: { type: Type.STRING },
          reason: { type: Type.STRING },
          guidance: { type: Type.STRING },
        },
        required: ["question", "reason", "guidance"],
      },
    },
  },
  required: ["followUps"],
};

const mockQuestionSchema: Schema = {
  type: Type.ARRAY,
  items: {
    type: Type.OBJECT,
    properties: {
      question: { type: Type.STRING },
      type: { type: Type.STRING, enum: ["behavioral", "technical", "situational"] },
      difficulty: { type: Type.STRING, enum: ["easy", "medium", "hard"] },
      themes: { type: Type.ARRAY, items: { type: Type.STRING } },
      expectedFramework: { type: Type.STRING },
    },
    required: ["question", "type", "difficulty", "themes", "expectedFramework"],
  },
};

const MOCK_BRIEFS: Record<MockQuestionRequest['type'], string> = {
  behavioral: 'Focus on past experiences and real situations. Use "Tell me about a time..." or "Describe a situation..." phrasing.',
  technical: 'Focus on the skills and technologies in the job description. Mix theoretical and practical questions.',
  situational: 'Present hypothetical scenarios. Use "What would you do if..." or "How would you handle..." phrasing.',
};

/**
 * Gemini-backed coaching model. Throws on any failure; the engine decides
 * how to degrade.
 */
export class GeminiCoach implements CoachingModel {
  private client: ModelClient | null;

  constructor(private readonly settings: GeminiSettings, client?: ModelClient) {
    this.client = client ?? null;
  }

  private getClient(): ModelClient {
    if (!this.client) this.client = createModelClient(this.settings.apiKey);
    return this.client;
  }

  private async complete(
    contents: string,
    opts: { temperature?: number; schema?: Schema; systemInstruction?: string } = {},
  ): Promise<string> {
    const response = await this.getClient().generateContent({
      model: this.settings.model,
      contents,
      config: {
        temperature: opts.temperature ?? this.settings.temperature,
        ...(opts.systemInstruction ? { systemInstruction: opts.systemInstruction } : {}),
        ...(opts.schema ? { responseMimeType: "application/json", responseSchema: opts.schema } : {}),
      },
    });

    if (!response.text) throw new Error("Empty response");
    return response.text;
  }

  public analyzeQuestion(question: string, jobContext: string): Promise<string> {
    const prompt = `
      Interview Question: ${question}
      Job Context: ${jobContext || "Not provided"}

      Analyze the question:
      1. Question Type: Behavioral, Technical, Situational, or Other.
      2. Key Themes: the topics and skills it targets.
      3. What They're Really Asking: the underlying intent.
      4. Recommended Framework: STAR, CAR, or Direct Answer.
      5. Key Points to Address.
      6. Potential Pitfalls.
      Be concise.
    `;
    return this.complete(prompt, {
      temperature: COACHING_POLICY.GENERATION.ANALYSIS_TEMPERATURE,
      systemInstruction: "You are an expert interview coach.",
    });
  }

  public generateAnswer(brief: AnswerBrief): Promise<string> {
    const { context } = brief;
    const previous = context.previousExchange
      ? `\nThis is a follow-up to:\nQuestion: ${context.previousExchange.question}\nAnswer given: ${context.previousExchange.answer}\n`
      : '';

    const prompt = `
      Interview Question: ${brief.question}

      Question Analysis:
      ${brief.analysis || "Not available"}

      Relevant CV Information:
      ${context.cv || "Not provided"}

      Relevant Experiences:
      ${context.experience || "Not provided"}

      Personality Profile:
      ${context.personality || "Not provided"}

      Company Context:
      ${context.company || "Not provided"}
      ${previous}
      ${brief.guidance}

      Generate the interview answer.
    `;

    return this.complete(prompt, {
      systemInstruction: [
        "You are an expert interview coach writing the candidate's answer.",
        "- Only use real experiences from the provided context.",
        "- Include concrete details, metrics and outcomes.",
        "- Aim for 2-3 minutes spoken (about 250-350 words).",
        "- Use STAR for behavioral questions and a direct answer for technical ones.",
        "- Align with company culture when relevant.",
      ].join('\n'),
    });
  }

  public critiqueAnswer(question: string, answer: string, cvContext: string): Promise<string> {
    const prompt = `
      Question: ${question}

      Answer: ${answer}

      CV Info: ${cvContext || "Not provided"}

      Score the answer 0-10 on authenticity, relevance, structure, specificity, impact and length.
      Give the overall score (their average), 2-3 strengths, 2-3 specific improvements,
      and a fact check against the CV if one was provided.
    `;
    return this.complete(prompt, {
      temperature: COACHING_POLICY.GENERATION.ANALYSIS_TEMPERATURE,
      schema: critiqueSchema,
      systemInstruction: "You are a strict interview coach.",
    });
  }

  public checkCompanyAlignment(answer: string, companyResearch: string): Promise<string> {
    const prompt = `
      Answer: ${answer}

      Company Research:
      ${companyResearch}

      Analyze how well the answer aligns with the company's culture and values:
      1. Alignment Score (0-10)
      2. What Aligns Well
      3. What Could Be Better
      4. Suggested company-specific additions
    `;
    return this.complete(prompt, { temperature: COACHING_POLICY.GENERATION.ANALYSIS_TEMPERATURE });
  }

  public refineAnswer(answer: string, strengths: string[]): Promise<string> {
    return this.complete(`Polish this answer:\n\n${answer}`, {
      systemInstruction: [
        "You are polishing a final interview answer.",
        "Make it clear, concise, well-structured and conversational.",
        `Preserve these strengths: ${strengths.join(", ") || "none recorded"}.`,
        "Only make minor improvements to clarity and flow. Don't change the core content.",
      ].join('\n'),
    });
  }

  public extractKeyPoints(question: string, answer: string): Promise<string> {
    return this.complete(`Question: ${question}\n\nAnswer: ${answer}\n\nExtract the key points to remember and delivery tips.`, {
      temperature: COACHING_POLICY.GENERATION.ANALYSIS_TEMPERATURE,
      schema: keyPointsSchema,
    });
  }

  public predictFollowUps(question: string, answer: string): Promise<string> {
    const prompt = `
      Original Question: ${question}

      Answer Given: ${answer}

      Predict 2-3 follow-up questions an interviewer is likely to ask next.
      For each: the question, why they might ask it, and brief guidance on how to respond.
    `;
    return this.complete(prompt, { schema: followUpSchema });
  }

  public generateMockQuestions(request: MockQuestionRequest): Promise<string> {
    const prompt = `
      Generate ${request.count} ${request.type} interview questions for ${request.position} at ${request.companyName}.

      Requirements:
      - ${MOCK_BRIEFS[request.type]}
      - Difficulty level: ${request.difficulty}
      - Company culture: ${request.companyResearch || "Not available"}
      - Job requirements: ${request.jobDescription || "Not provided"}
      - Expected framework: ${COACHING_POLICY.MOCK.FRAMEWORKS[request.type]}
    `;
    return this.complete(prompt, {
      temperature: COACHING_POLICY.GENERATION.CREATIVE_TEMPERATURE,
      schema: mockQuestionSchema,
    });
  }
}
