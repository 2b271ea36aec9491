import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { Chapter } from "../types";
import { writeArchive } from "./archive";
import type { CatalogClient } from "./catalog-client";
import { MissingExtensionError, NoPagesError } from "./errors";
import type { HttpClient } from "./http";
import { logDebug, logInfo } from "./logger";
import { fetchPage } from "./page-fetcher";
import { publishArchive } from "./publisher";
import type { WorkerPool } from "./worker-pool";

export type DownloadDeps = {
  catalog: Pick<CatalogClient, "getAtHomeServer">;
  http: HttpClient;
  pool: WorkerPool;
  tempRoot: string | null;
};

export type DownloadOutcome = "archived" | "skipped";

export function pageFileName(index: number, remoteName: string): string {
  const ext = path.extname(remoteName);
  if (ext.length <= 1) {
    throw new MissingExtensionError(remoteName);
  }
  return `${String(index + 1).padStart(3, "0")}${ext}`;
}

function pageIndexOf(filePath: string): number {
  return Number.parseInt(path.basename(filePath), 10);
}

export function pageUrl(baseUrl: string, hash: string, remoteName: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/data/${hash}/${remoteName}`;
}

async function createWorkDir(tempRoot: string | null): Promise<string> {
  const workspace = tempRoot ?? tmpdir();
  await mkdir(workspace, { recursive: true });
  return mkdtemp(path.join(workspace, "chapter-mirror-"));
}

/**
 * Downloads every page of a chapter into a private temp directory, zips them in page order and
 * publishes the archive at archivePath. Nothing is published unless every page succeeded.
 */
export async function downloadAndArchive(
  chapter: Chapter,
  archivePath: string,
  deps: DownloadDeps,
): Promise<DownloadOutcome> {
  const workDir = await createWorkDir(deps.tempRoot);

  try {
    const atHome = await deps.catalog.getAtHomeServer(chapter.id);
    const pages = atHome.chapter.data;

    if (pages.length === 0) {
      if (chapter.attributes.externalUrl !== undefined) {
        logDebug(`Skipping chapter ${chapter.id} with external url and no pages`);
        return "skipped";
      }
      throw new NoPagesError(chapter.id);
    }

    // Resolve every name up front so a bad one fails before any request goes out.
    const targets = pages.map((remoteName, index) => ({
      url: pageUrl(atHome.baseUrl, atHome.chapter.hash, remoteName),
      filePath: path.join(workDir, pageFileName(index, remoteName)),
    }));

    // After the first failure, queued pages are dropped and in-flight ones are awaited so that
    // nothing is still writing into workDir when it is removed.
    const state: { failure: { error: unknown } | null } = { failure: null };
    const downloaded: string[] = [];
    await Promise.all(
      targets.map((target) =>
        deps.pool(async () => {
          if (state.failure) return;
          try {
            await fetchPage(deps.http, target.url, target.filePath);
            downloaded.push(target.filePath);
          } catch (error) {
            state.failure ??= { error };
          }
        }),
      ),
    );
    if (state.failure) throw state.failure.error;

    // Completion order is arbitrary; file names start with the page index.
    downloaded.sort((a, b) => pageIndexOf(a) - pageIndexOf(b));

    const tempArchive = path.join(workDir, "output.zip");
    await writeArchive(downloaded, tempArchive);
    await publishArchive(tempArchive, archivePath);
    logInfo(`Archived ${downloaded.length} pages to ${archivePath}`);
    return "archived";
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}
