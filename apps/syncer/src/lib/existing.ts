import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { KindMismatchError } from "./errors";
import { ARCHIVE_EXTENSION } from "./naming";

export type FindResult = { kind: "missing" } | { kind: "exists" } | { kind: "rename"; path: string };

/**
 * Listing of one directory, scanned on first use and reused for the rest of the batch.
 * Entries created or renamed after the scan are not seen.
 */
export class DirectorySnapshot {
  private pending: Promise<Dirent[]> | null = null;

  constructor(readonly directory: string) {}

  get materialized(): boolean {
    return this.pending !== null;
  }

  entries(): Promise<Dirent[]> {
    if (!this.pending) {
      this.pending = readdir(this.directory, { withFileTypes: true });
    }
    return this.pending;
  }
}

function isNotFound(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

export async function resolveExisting(
  expectedPath: string,
  snapshot: DirectorySnapshot,
  stableKey: string,
  expectDirectory: boolean,
): Promise<FindResult> {
  try {
    const info = await stat(expectedPath);
    if (info.isDirectory() === expectDirectory) {
      return { kind: "exists" };
    }
    throw new KindMismatchError(expectedPath, expectDirectory);
  } catch (error) {
    if (!isNotFound(error)) throw error;
  }

  // Display names drift upstream; only the key suffix identifies an entry.
  const suffix = expectDirectory ? stableKey : `${stableKey}${ARCHIVE_EXTENSION}`;
  // Kinds come from the listing itself, so symlinks are never candidates.
  for (const entry of await snapshot.entries()) {
    if (!entry.name.endsWith(suffix)) continue;

    const kindMatches = expectDirectory ? entry.isDirectory() : entry.isFile();
    if (kindMatches) {
      return { kind: "rename", path: path.join(snapshot.directory, entry.name) };
    }
  }

  return { kind: "missing" };
}
