import util from "util";

export type OrganizerErrorCode =
  | "ENUMERATION_FAILED"
  | "OUTPUT_ROOT_FAILED"
  | "REPORT_WRITE_FAILED";

/**
 * A structural failure that stops the run. Per-file problems are collected
 * as `FileFailure` records instead and never surface as this error.
 */
export class OrganizerError extends Error {
  readonly code: OrganizerErrorCode;

  constructor(code: OrganizerErrorCode, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "OrganizerError";
    this.code = code;
  }
}

/**
 * Narrow a thrown value to a message. Errors raised by Node built-ins can come
 * from another realm (Jest's sandbox, `vm`), so `instanceof Error` alone misses
 * them.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error || util.types.isNativeError(error)) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}
