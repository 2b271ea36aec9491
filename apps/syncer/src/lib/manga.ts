import { mkdir, rename } from "node:fs/promises";
import path from "node:path";
import type { Manga, SyncSummary } from "../types";
import { type CatalogClient, englishOrFirst } from "./catalog-client";
import type { AppConfig } from "./config";
import { downloadAndArchive } from "./download";
import { DirectorySnapshot, resolveExisting } from "./existing";
import type { GroupNameCache } from "./groups";
import type { HttpClient } from "./http";
import { logDebug, logInfo, logTrace } from "./logger";
import { type NamingOptions, composeMangaDirname, encodeStableKey } from "./naming";
import { type SyncDeps, syncChapters } from "./sync";
import type { WorkerPool } from "./worker-pool";

export type SyncContext = {
  config: AppConfig;
  catalog: CatalogClient;
  http: HttpClient;
  pool: WorkerPool;
  groups: GroupNameCache;
};

export function namingOptions(config: AppConfig): NamingOptions {
  return { allowQuestionMarks: config.ALLOW_QUESTION_MARKS };
}

export function createSyncDeps(ctx: SyncContext): SyncDeps {
  return {
    catalog: ctx.catalog,
    http: ctx.http,
    pool: ctx.pool,
    tempRoot: ctx.config.tempRootAbsolute,
    naming: namingOptions(ctx.config),
    renameChapters: ctx.config.RENAME_CHAPTERS,
    ignoredChapters: ctx.config.IGNORED_CHAPTERS,
    download: downloadAndArchive,
  };
}

/**
 * Finds or creates the directory for a manga under outputDir. A directory carrying the same key
 * under an older title is renamed when renameManga is set, otherwise it keeps being used as is.
 */
export async function resolveMangaDir(
  manga: Manga,
  options: { outputDir: string; renameManga: boolean; naming: NamingOptions },
): Promise<string> {
  const stableKey = encodeStableKey(manga.id);
  const title = englishOrFirst(manga.attributes.title);
  if (!title) {
    throw new Error(`No title present for manga ${manga.id}`);
  }

  const dirPath = path.join(options.outputDir, composeMangaDirname(title, stableKey, options.naming));
  const found = await resolveExisting(dirPath, new DirectorySnapshot(options.outputDir), stableKey, true);

  switch (found.kind) {
    case "missing":
      logDebug(`Creating ${dirPath}`);
      await mkdir(dirPath, { recursive: true });
      return dirPath;
    case "exists":
      logTrace(`Directory already exists for "${title}"`);
      return dirPath;
    case "rename":
      if (options.renameManga) {
        logInfo(`Renaming existing directory from ${found.path} to ${dirPath}`);
        await rename(found.path, dirPath);
        return dirPath;
      }
      logDebug(`Found existing directory ${found.path}, not renaming`);
      return found.path;
  }
}

function mangaDirOptions(ctx: SyncContext) {
  return {
    outputDir: ctx.config.outputDirAbsolute,
    renameManga: ctx.config.RENAME_MANGA,
    naming: namingOptions(ctx.config),
  };
}

export async function syncManga(mangaId: string, ctx: SyncContext): Promise<SyncSummary> {
  logDebug(`Syncing ${mangaId}`);
  const manga = await ctx.catalog.getManga(mangaId);
  const dir = await resolveMangaDir(manga, mangaDirOptions(ctx));

  const chapters = await ctx.catalog.getChapterFeed(mangaId);
  const groupNames = await ctx.groups.resolve(chapters);
  logDebug(`Got ${chapters.length} chapters for "${englishOrFirst(manga.attributes.title) ?? mangaId}"`);

  const summary = await syncChapters(chapters, dir, groupNames, true, createSyncDeps(ctx));
  logInfo(
    `Finished ${mangaId}: downloaded=${summary.downloaded} renamed=${summary.renamed} skipped=${summary.skipped} failed=${summary.failures.length}`,
  );
  return summary;
}

export async function syncSingleChapter(chapterId: string, ctx: SyncContext): Promise<SyncSummary> {
  logInfo(`Syncing single chapter ${chapterId}`);
  const chapter = await ctx.catalog.getChapter(chapterId);
  const mangaId = chapter.relationships.find((r) => r.type === "manga")?.id;
  if (!mangaId) {
    throw new Error(`Chapter ${chapterId} has no associated manga`);
  }

  const manga = await ctx.catalog.getManga(mangaId);
  const dir = await resolveMangaDir(manga, mangaDirOptions(ctx));
  const groupNames = await ctx.groups.resolve([chapter]);

  return syncChapters([chapter], dir, groupNames, false, createSyncDeps(ctx));
}
