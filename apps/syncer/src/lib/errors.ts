export type SyncErrorKind = "transient" | "identity" | "consistency" | "closed" | "pagination";

export class SyncError extends Error {
  constructor(
    message: string,
    readonly kind: SyncErrorKind,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  get retryable(): boolean {
    return this.kind === "transient";
  }
}

export class HttpStatusError extends SyncError {
  constructor(
    readonly status: number,
    readonly url: string,
    detail = "",
  ) {
    super(`Request failed (${status}) for ${url}${detail ? `: ${detail}` : ""}`, "transient");
  }
}

export class EmptyBodyError extends SyncError {
  constructor(readonly destination: string) {
    super(`Wrote empty file to ${destination}`, "transient");
  }
}

export class InvalidIdentityError extends SyncError {
  constructor(readonly id: string) {
    super(`Invalid UUID string "${id}"`, "identity");
  }
}

export class MissingExtensionError extends SyncError {
  constructor(readonly pageFileName: string) {
    super(`No extension for ${pageFileName}`, "identity");
  }
}

export class NoPagesError extends SyncError {
  constructor(readonly chapterId: string) {
    super(`Got chapter with no pages: ${chapterId}`, "identity");
  }
}

export class KindMismatchError extends SyncError {
  constructor(
    readonly entryPath: string,
    readonly expectDirectory: boolean,
  ) {
    super(
      `${entryPath} exists but is ${expectDirectory ? "not a directory" : "a directory"}, expected ${
        expectDirectory ? "a directory" : "a file"
      }`,
      "consistency",
    );
  }
}

export class ClosedError extends SyncError {
  constructor() {
    super("Closed", "closed");
  }
}

export class PaginationError extends SyncError {
  constructor(message: string) {
    super(message, "pagination");
  }
}

export class ChapterSyncError extends SyncError {
  constructor(
    readonly chapterId: string,
    cause: unknown,
  ) {
    super(`Failed while downloading chapter ${chapterId}: ${errorMessage(cause)}`, kindOf(cause), { cause });
  }
}

export function kindOf(error: unknown): SyncErrorKind {
  return error instanceof SyncError ? error.kind : "transient";
}

export function isClosedError(error: unknown): boolean {
  return error instanceof SyncError && error.kind === "closed";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
