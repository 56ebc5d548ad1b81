export type SyncErrorCode =
  | "CACHE_READ_ERROR"
  | "AUTH_TIMEOUT"
  | "AUTH_REJECTED"
  | "AUTH_NOT_READY"
  | "TRANSPORT_ERROR"
  | "SERVER_ERROR"
  | "MALFORMED_ARTIFACT"
  | "CONFIG_ERROR";

interface SyncErrorDetails {
  cause?: unknown;
  status?: number;
  body?: string;
}

export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly status?: number;
  readonly body?: string;

  constructor(code: SyncErrorCode, message: string, details: SyncErrorDetails = {}) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = "SyncError";
    this.code = code;
    this.status = details.status;
    this.body = details.body;
  }
}

export function isSyncError(err: unknown, code?: SyncErrorCode): err is SyncError {
  if (!(err instanceof SyncError)) return false;
  return code === undefined || err.code === code;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
