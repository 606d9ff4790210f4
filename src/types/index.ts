// ── Errors ───────────────────────────────────────────────────────────────────
export {
  APP_ERROR_CODES,
  type AppErrorCode,
  isAppErrorCode,
  AppError,
  presentError,
  errorMessage,
  toError,
} from "./errors.ts";
