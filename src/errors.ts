export type SplitErrorCode =
  | "FILE_NOT_FOUND"
  | "UNREADABLE"
  | "ENCRYPTED"
  | "NO_BOOKMARKS"
  | "UNRESOLVED_BOOKMARKS"
  | "OUTPUT_UNWRITABLE";

/** Fatal condition that stops a run before any chapter is written. */
export class SplitError extends Error {
  readonly code: SplitErrorCode;

  constructor(code: SplitErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SplitError";
    this.code = code;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
