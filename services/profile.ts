import type { ContextRetriever } from "./collaborators";
import type { ResearchCache } from "./researchCache";
import { COACHING_POLICY } from "./policy";

export type MemoryKind = 'cv' | 'experience' | 'personality';

export interface MemoryEntry {
  kind: MemoryKind;
  content: string;
  tags: string[];
  addedAt: number;
}

export interface PersonalityProfile {
  communicationStyle?: string;
  workValues?: string[];
  strengths?: string[];
  weaknesses?: string[];
  careerGoals?: string;
}

const STOP_WORDS = new Set(['the', 'and', 'for', 'you', 'your', 'with', 'that', 'this', 'are', 'was', 'about', 'tell', 'time', 'what', 'how', 'when', 'why', 'did', 'have', 'from']);

const tokenize = (text: string): string[] =>
  text.toLowerCase().split(/[^a-z0-9+#]+/).filter(t => t.length > 2 && !STOP_WORDS.has(t));

/** Splits text into windows of `size` characters that overlap by `overlap`. */
export const chunkText = (
  text: string,
  size: number = COACHING_POLICY.PROFILE.CHUNK_SIZE,
  overlap: number = COACHING_POLICY.PROFILE.CHUNK_OVERLAP,
): string[] => {
  if (size <= overlap) throw new Error('Chunk size must exceed overlap');
  const chunks: string[] = [];
  for (let start = 0; start < text.length; start += size - overlap) {
    chunks.push(text.slice(start, start + size));
    if (start + size >= text.length) break;
  }
  return chunks;
};

export const formatPersonality = (profile: PersonalityProfile): string => {
  const sections: string[] = [];
  if (profile.communicationStyle) sections.push(`Communication Style: ${profile.communicationStyle}`);
  if (profile.workValues?.length) sections.push(`Work Values: ${profile.workValues.join(', ')}`);
  if (profile.strengths?.length) sections.push(`Strengths: ${profile.strengths.join(', ')}`);
  if (profile.weaknesses?.length) sections.push(`Areas for Improvement: ${profile.weaknesses.join(', ')}`);
  if (profile.careerGoals) sections.push(`Career Goals: ${profile.careerGoals}`);
  return sections.join('\n\n');
};

/**
 * The candidate's long-term memory: CV chunks, experience stories and a
 * personality profile, ranked by keyword overlap with the query.
 */
export class ProfileStore {
  private memories: MemoryEntry[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  public addCV(cvText: string, tags: string[] = []) {
    chunkText(cvText.trim()).forEach(chunk => {
      this.memories.push({ kind: 'cv', content: chunk, tags: [...tags], addedAt: this.now() });
    });
  }

  public addExperience(experience: string, tags: string[] = []) {
    this.memories.push({ kind: 'experience', content: experience.trim(), tags: [...tags], addedAt: this.now() });
  }

  /** Replaces any earlier personality profile. */
  public addPersonality(profile: PersonalityProfile) {
    this.memories = this.memories.filter(m => m.kind !== 'personality');
    this.memories.push({ kind: 'personality', content: formatPersonality(profile), tags: [], addedAt: this.now() });
  }

  public search(query: string, limit: number, kind?: MemoryKind): MemoryEntry[] {
    const terms = new Set(tokenize(query));
    const scoreOf = (m: MemoryEntry) => {
      const words = tokenize(`${m.content} ${m.tags.join(' ')}`);
      return words.reduce((s, w) => s + (terms.has(w) ? 1 : 0), 0);
    };

    return this.memories
      .filter(m => !kind || m.kind === kind)
      .map((m, index) => ({ m, index, score: scoreOf(m) }))
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .slice(0, limit)
      .map(({ m }) => m);
  }

  public count(kind?: MemoryKind): number {
    return kind ? this.memories.filter(m => m.kind === kind).length : this.memories.length;
  }

  public clear(kind?: MemoryKind) {
    this.memories = kind ? this.memories.filter(m => m.kind !== kind) : [];
  }
}

/**
 * Formats long-term memory and cached company research for the answer loop.
 */
export class ProfileRetriever implements ContextRetriever {
  constructor(
    private readonly profile: ProfileStore,
    private readonly research: ResearchCache,
  ) {}

  public async retrieveCV(query: string): Promise<string> {
    const results = this.profile.search(query, COACHING_POLICY.PROFILE.CV_RESULTS, 'cv');
    if (results.length === 0) return "No relevant CV information found.";
    return results.map((doc, i) => `[CV Section ${i + 1}]\n${doc.content}\n`).join('\n');
  }

  public async retrieveExperience(query: string): Promise<string> {
    const results = this.profile.search(query, COACHING_POLICY.PROFILE.EXPERIENCE_RESULTS, 'experience');
    if (results.length === 0) return "No relevant experiences found.";
    return results.map((doc, i) => {
      const tagStr = doc.tags.length ? ` [Tags: ${doc.tags.join(', ')}]` : '';
      return `[Experience ${i + 1}]${tagStr}\n${doc.content}\n`;
    }).join('\n');
  }

  public async retrievePersonality(): Promise<string> {
    const results = this.profile.search('personality traits characteristics', COACHING_POLICY.PROFILE.PERSONALITY_RESULTS, 'personality');
    if (results.length === 0) return "No personality profile found.";
    return results.map(doc => doc.content).join('\n\n');
  }

  public async retrieveCompanyResearch(company: string): Promise<string> {
    const research = this.research.getResearch(company);
    if (!research) return "";

    const formatted: string[] = [];
    if (research.overview) formatted.push(`**Company Overview:**\n${research.overview.content}\n`);
    if (research.culture) formatted.push(`**Company Culture:**\n${research.culture.content}\n`);
    if (research.news) formatted.push(`**Recent News:**\n${research.news.content}\n`);
    if (research.positionAnalysis) formatted.push(`**Position Analysis:**\n${research.positionAnalysis.content}\n`);
    return formatted.join('\n');
  }
}
