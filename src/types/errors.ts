// ── App Error Codes ──────────────────────────────────────────────────────────

export const APP_ERROR_CODES = [
  "pyTimeout",
  "pyExec",
  "pyMemory",
  "cacheCorrupt",
  "cacheMiss",
  "exportFailed",
  "pathDenied",
  "crewBudget",
  "autoflow",
  "autoflowTimeout",
  "unknown",
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];

export function isAppErrorCode(value: string): value is AppErrorCode {
  return (APP_ERROR_CODES as readonly string[]).includes(value);
}

// ── App Error ────────────────────────────────────────────────────────────────

export class AppError extends Error {
  override readonly name = "AppError";

  constructor(
    readonly code: AppErrorCode,
    message: string,
    readonly suggestion?: string,
  ) {
    super(message);
  }

  /** "[code] message", the form written to run logs. */
  describe(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ── Presentation ─────────────────────────────────────────────────────────────

const PRESENTED_MESSAGES: Partial<Record<AppErrorCode, string>> = {
  pyTimeout: "Python timed out. Try smaller samples or increase timeout.",
  pyMemory: "Python ran out of memory. Sample with nrows=… or drop columns.",
  cacheCorrupt: "Cached artifacts are invalid. Clear cache and rerun.",
  pathDenied: "Access to that path is not allowed.",
  exportFailed: "Could not create export archive.",
  crewBudget: "Crew stopped at budget limit.",
  autoflowTimeout: "AutoFlow timed out. Cooling down before the next automatic run.",
};

/**
 * User-facing text for an AppError. Codes without a canned message show
 * the error's own message.
 */
export function presentError(error: AppError): string {
  return PRESENTED_MESSAGES[error.code] ?? error.message;
}

// ── Unknown-error helpers ────────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error | undefined {
  return err instanceof Error ? err : undefined;
}
