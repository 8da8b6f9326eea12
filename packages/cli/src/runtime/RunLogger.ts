import { promises as fs } from "node:fs";
import path from "node:path";
import type { TraceEvent } from "@respc/compiler";

export type RunLogEvent = TraceEvent;

export class RunLogger {
  readonly logPath: string;
  readonly logDir: string;
  readonly runId: string;

  constructor(workspaceRoot: string, logDir: string, runId: string) {
    const resolvedDir = path.resolve(workspaceRoot, logDir);
    this.logDir = resolvedDir;
    this.runId = runId;
    this.logPath = path.join(resolvedDir, `${runId}.jsonl`);
  }

  async log(type: string, data: Record<string, unknown>): Promise<void> {
    await this.append([{ type, timestamp: new Date().toISOString(), data }]);
  }

  /** Appends events recorded elsewhere, keeping their own timestamps. */
  async append(events: readonly RunLogEvent[]): Promise<void> {
    if (events.length === 0) return;
    await fs.mkdir(this.logDir, { recursive: true });
    const lines = events.map((event) => `${JSON.stringify(event)}\n`).join("");
    await fs.appendFile(this.logPath, lines, "utf8");
  }
}
