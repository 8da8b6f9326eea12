import type { EventLogger } from "@respc/shared";

export interface TraceEvent {
  type: string;
  timestamp: string;
  data: Record<string, unknown>;
}

/** In-memory event log for one or more compilations, drained by the host. */
export class CompilationTrace implements EventLogger {
  private events: TraceEvent[] = [];
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  log(type: string, data: Record<string, unknown>): void {
    this.events.push({ type, timestamp: this.now().toISOString(), data });
  }

  list(): TraceEvent[] {
    return [...this.events];
  }

  ofType(type: string): TraceEvent[] {
    return this.events.filter((event) => event.type === type);
  }

  /** Returns the recorded events and clears the trace. */
  drain(): TraceEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }
}
