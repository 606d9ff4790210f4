import type { LogFileWriter } from "../run-log.ts";

// ── Manual Clock ────────────────────────────────────────────────────────────

export interface ManualClock {
  now: Date;
  readonly fn: () => Date;
  advance(ms: number): void;
}

export function createManualClock(start = new Date("2026-03-01T12:00:00.000Z")): ManualClock {
  const clock: ManualClock = {
    now: start,
    fn: () => clock.now,
    advance(ms: number) {
      clock.now = new Date(clock.now.getTime() + ms);
    },
  };
  return clock;
}

// ── In-memory File Writer ───────────────────────────────────────────────────

export class MemoryLogFileWriter implements LogFileWriter {
  readonly files = new Map<string, string>();
  readonly dirs: string[] = [];
  /** Paths whose next append rejects. */
  readonly failures = new Set<string>();

  async appendFile(path: string, content: string): Promise<void> {
    if (this.failures.delete(path)) {
      throw new Error(`disk full: ${path}`);
    }
    this.files.set(path, (this.files.get(path) ?? "") + content);
  }

  async mkdir(path: string): Promise<void> {
    this.dirs.push(path);
  }

  /** Parsed JSON lines of one file. */
  lines(path: string): Record<string, unknown>[] {
    const text = this.files.get(path) ?? "";
    return text
      .split("\n")
      .filter((line) => line.length > 0)
      .map((line): Record<string, unknown> => JSON.parse(line));
  }
}
