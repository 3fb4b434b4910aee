import { RESEARCH_FIELDS } from "../types";
import type { ResearchData, ResearchField } from "../types";
import type { CompanySearchProvider } from "./collaborators";
import { COACHING_POLICY, DAY_MS } from "./policy";
import { AuditLog } from "./auditLog";
import { describeError } from "./errors";

export interface CachedField {
  content: string;
  sources: string[];
  timestamp: number;
  expiresAt: number;
}

export type CachedResearch = Partial<Record<ResearchField, CachedField>>;

export interface ResearchCacheOptions {
  ttlDays?: number;
  now?: () => number;
  log?: AuditLog;
}

export interface ResearchLookup {
  data: ResearchData;
  fromCache: boolean;
  error?: string;
}

const companyKey = (company: string) => company.trim().toLowerCase();

const emptySources = (): Record<ResearchField, string[]> => ({
  overview: [],
  culture: [],
  news: [],
  positionAnalysis: [],
});

/**
 * Company research cache with per-field expiry. Reads expire lazily; fetches
 * always replace the complete field set under a single timestamp.
 */
export class ResearchCache {
  private entries = new Map<string, { companyName: string; position: string; fields: CachedResearch }>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly log: AuditLog;

  constructor(private readonly search: CompanySearchProvider, options: ResearchCacheOptions = {}) {
    this.ttlMs = (options.ttlDays ?? COACHING_POLICY.RESEARCH.TTL_DAYS) * DAY_MS;
    this.now = options.now ?? Date.now;
    this.log = options.log ?? new AuditLog();
  }

  /**
   * Fresh fields for a company, or null when nothing fresh survives.
   * A field stays fresh up to and including its expiry instant.
   */
  public getResearch(company: string): CachedResearch | null {
    const entry = this.entries.get(companyKey(company));
    if (!entry) return null;

    const now = this.now();
    const fresh: CachedResearch = {};
    for (const field of RESEARCH_FIELDS) {
      const cached = entry.fields[field];
      if (cached && cached.expiresAt >= now) fresh[field] = cached;
    }
    return Object.keys(fresh).length > 0 ? fresh : null;
  }

  /**
   * Writes the supplied fields with one shared timestamp. Fields not in
   * `data` keep whatever the entry already had.
   */
  public saveResearch(company: string, data: Partial<Record<ResearchField, string>>, opts: { position?: string; sources?: Partial<Record<ResearchField, string[]>> } = {}) {
    const key = companyKey(company);
    const timestamp = this.now();
    const existing = this.entries.get(key);
    const fields: CachedResearch = { ...(existing?.fields ?? {}) };

    let written = 0;
    for (const field of RESEARCH_FIELDS) {
      const content = data[field];
      if (content === undefined) continue;
      fields[field] = {
        content,
        sources: opts.sources?.[field] ?? [],
        timestamp,
        expiresAt: timestamp + this.ttlMs,
      };
      written++;
    }

    this.entries.set(key, {
      companyName: company.trim(),
      position: opts.position ?? existing?.position ?? '',
      fields,
    });
    this.log.write('CACHE', `Cached research for ${company} (${written} fields).`);
  }

  /**
   * Cached research when any field is fresh, otherwise a full fetch of all
   * four fields. `forceRefresh` skips the cache read.
   */
  public async getOrFetch(company: string, position: string, forceRefresh = false): Promise<ResearchLookup> {
    if (!forceRefresh) {
      const cached = this.getResearch(company);
      if (cached) {
        this.log.write('CACHE', `Using cached research for ${company}.`);
        return { data: this.toResearchData(company, position, cached), fromCache: true };
      }
    }

    this.log.write('CACHE', `${forceRefresh ? 'Refreshing' : 'Researching'} ${company}...`);

    try {
      const overview = await this.search.searchCompanyOverview(company);
      const culture = await this.search.searchCompanyCulture(company);
      const news = await this.search.searchRecentNews(company, COACHING_POLICY.RESEARCH.NEWS_LOOKBACK_DAYS);
      const positionInsights = await this.search.searchPositionInsights(company, position);

      this.saveResearch(company, {
        overview: overview.summary,
        culture: culture.summary,
        news: news.summary,
        positionAnalysis: positionInsights.summary,
      }, {
        position,
        sources: {
          overview: overview.sources,
          culture: culture.sources,
          news: news.sources,
          positionAnalysis: positionInsights.sources,
        },
      });

      const stored = this.getResearch(company) ?? {};
      return { data: this.toResearchData(company, position, stored), fromCache: false };
    } catch (error) {
      const message = describeError(error);
      console.warn("Company research failed:", error);
      this.log.write('WARN', `Research for ${company} failed: ${message}`);
      return {
        data: {
          ...this.toResearchData(company, position, {}),
          overview: `Error researching ${company}: ${message}`,
        },
        fromCache: false,
        error: message,
      };
    }
  }

  public clearCompany(company: string) {
    if (this.entries.delete(companyKey(company))) {
      this.log.write('CACHE', `Cleared research cache for ${company}.`);
    }
  }

  /** Drops expired fields, and companies left with none. Returns the number of fields removed. */
  public clearExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      for (const field of RESEARCH_FIELDS) {
        const cached = entry.fields[field];
        if (cached && cached.expiresAt < now) {
          delete entry.fields[field];
          removed++;
        }
      }
      if (Object.keys(entry.fields).length === 0) this.entries.delete(key);
    }
    if (removed > 0) this.log.write('CACHE', `Cleared ${removed} expired research fields.`);
    return removed;
  }

  public toResearchData(company: string, position: string, fields: CachedResearch): ResearchData {
    const sources = emptySources();
    let researchedAt: number | null = null;
    for (const field of RESEARCH_FIELDS) {
      const cached = fields[field];
      if (!cached) continue;
      sources[field] = [...cached.sources];
      researchedAt = researchedAt === null ? cached.timestamp : Math.max(researchedAt, cached.timestamp);
    }
    const stored = this.entries.get(companyKey(company));

    return {
      companyName: stored?.companyName ?? company.trim(),
      position: position || stored?.position || '',
      overview: fields.overview?.content ?? '',
      culture: fields.culture?.content ?? '',
      news: fields.news?.content ?? '',
      positionAnalysis: fields.positionAnalysis?.content ?? '',
      sources,
      researchedAt,
    };
  }
}
