import { rename } from "node:fs/promises";
import path from "node:path";
import type { Chapter, SyncSummary } from "../types";
import type { DownloadDeps, DownloadOutcome } from "./download";
import { ChapterSyncError, errorMessage, isClosedError } from "./errors";
import { DirectorySnapshot, resolveExisting } from "./existing";
import { groupNamesFor } from "./groups";
import { logDebug, logError, logInfo, logTrace } from "./logger";
import { type NamingOptions, composeChapterFilename, encodeStableKey } from "./naming";

export type SyncDeps = DownloadDeps & {
  naming: NamingOptions;
  renameChapters: boolean;
  ignoredChapters: ReadonlySet<string>;
  download: (chapter: Chapter, archivePath: string, deps: DownloadDeps) => Promise<DownloadOutcome>;
};

async function syncOne(
  chapter: Chapter,
  mangaDir: string,
  snapshot: DirectorySnapshot,
  groupNames: ReadonlyMap<string, string>,
  deps: SyncDeps,
  summary: SyncSummary,
): Promise<void> {
  const stableKey = encodeStableKey(chapter.id);
  const filename = composeChapterFilename(chapter, groupNamesFor(chapter, groupNames), stableKey, deps.naming);
  const chapterPath = path.join(mangaDir, filename);

  const found = await resolveExisting(chapterPath, snapshot, stableKey, false);
  if (found.kind === "exists") {
    logTrace(`Chapter already exists ${chapterPath}`);
    summary.skipped += 1;
    return;
  }
  if (found.kind === "rename") {
    if (deps.renameChapters) {
      logInfo(`Renaming existing chapter from ${found.path} to ${chapterPath}`);
      await rename(found.path, chapterPath);
      summary.renamed += 1;
    } else {
      logDebug(`Found existing chapter ${found.path}, not renaming`);
      summary.skipped += 1;
    }
    return;
  }

  logInfo(`Syncing chapter ${chapterPath}`);
  const outcome = await deps.download(chapter, chapterPath, deps);
  if (outcome === "archived") {
    summary.downloaded += 1;
  } else {
    summary.skipped += 1;
  }
}

/**
 * Brings every chapter into mangaDir, one at a time and in input order. All resolver calls of the
 * batch share one directory listing.
 *
 * With continueOnError a failed chapter is logged and recorded in the summary; without it the
 * first failure is thrown and later chapters are left alone. Shutdown always propagates.
 */
export async function syncChapters(
  chapters: Iterable<Chapter>,
  mangaDir: string,
  groupNames: ReadonlyMap<string, string>,
  continueOnError: boolean,
  deps: SyncDeps,
): Promise<SyncSummary> {
  const snapshot = new DirectorySnapshot(mangaDir);
  const summary: SyncSummary = { downloaded: 0, skipped: 0, renamed: 0, failures: [] };

  for (const chapter of chapters) {
    if (deps.ignoredChapters.has(chapter.id)) {
      logDebug(`Ignoring chapter ${chapter.id}`);
      summary.skipped += 1;
      continue;
    }

    try {
      await syncOne(chapter, mangaDir, snapshot, groupNames, deps, summary);
    } catch (error) {
      if (isClosedError(error)) throw error;

      const wrapped = new ChapterSyncError(chapter.id, error);
      if (!continueOnError) throw wrapped;

      logError(`${wrapped.message}, proceeding with other chapters`);
      summary.failures.push({ chapterId: chapter.id, message: errorMessage(error) });
    }
  }

  return summary;
}
