import type { SearchSummary } from "../types";
import type { CompanySearchProvider } from "./collaborators";
import { createModelClient } from "./gemini";
import type { GeminiSettings, ModelClient } from "./gemini";

const SEARCH_TEMPERATURE = 0.2;

/**
 * Company research through Gemini's Google Search grounding. Sources are the
 * web chunks the answer was grounded on.
 */
export class GeminiSearch implements CompanySearchProvider {
  private client: ModelClient | null;

  constructor(private readonly settings: Pick<GeminiSettings, 'apiKey' | 'model'>, client?: ModelClient) {
    this.client = client ?? null;
  }

  private getClient(): ModelClient {
    if (!this.client) this.client = createModelClient(this.settings.apiKey);
    return this.client;
  }

  private async search(query: string): Promise<SearchSummary> {
    const response = await this.getClient().generateContent({
      model: this.settings.model,
      contents: `Search the web and write a factual summary for interview preparation: ${query}`,
      config: {
        tools: [{ googleSearch: {} }],
        temperature: SEARCH_TEMPERATURE,
      },
    });

    if (!response.text) throw new Error("Empty response");

    const chunks = response.candidates?.[0]?.groundingMetadata?.groundingChunks ?? [];
    const sources = [...new Set(
      chunks
        .map(chunk => chunk.web?.uri)
        .filter((uri): uri is string => typeof uri === 'string' && uri.length > 0)
    )];

    return { summary: response.text.trim(), sources };
  }

  public searchCompanyOverview(company: string): Promise<SearchSummary> {
    return this.search(`${company} company overview mission values products services`);
  }

  public searchCompanyCulture(company: string): Promise<SearchSummary> {
    return this.search(`${company} company culture work environment employee reviews benefits`);
  }

  public searchRecentNews(company: string, days: number): Promise<SearchSummary> {
    return this.search(`${company} news and announcements from the last ${days} days`);
  }

  public searchPositionInsights(company: string, position: string): Promise<SearchSummary> {
    return this.search(`${position} at ${company}: responsibilities, requirements and interview process`);
  }
}
