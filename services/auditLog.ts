import { COACHING_POLICY } from "./policy";

export type LogTag = 'STATE' | 'LOOP' | 'SCORE' | 'ADAPT' | 'CACHE' | 'WARN' | 'FOLLOW-UP' | 'MOCK';

type Listener = (entries: readonly string[]) => void;

/**
 * Newest-first trail of engine events, shared by every controller that
 * belongs to one orchestrator.
 */
export class AuditLog {
  private lines: string[] = [];
  private listeners: Listener[] = [];

  constructor(
    private readonly limit: number = COACHING_POLICY.SESSION.MAX_LOG_ENTRIES,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  public write(tag: LogTag, msg: string) {
    const time = this.clock().toISOString();
    this.lines = [`[${time}] [${tag}] ${msg}`, ...this.lines];
    if (this.lines.length > this.limit) this.lines.pop();
    this.listeners.forEach(cb => cb(this.lines));
  }

  public entries(): readonly string[] { return this.lines; }

  public subscribe(cb: Listener) {
    this.listeners.push(cb);
    return () => { this.listeners = this.listeners.filter(l => l !== cb); };
  }

  public clear() {
    this.lines = [];
  }
}
