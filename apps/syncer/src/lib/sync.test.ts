import { readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import { createFetchStub, createTestHttp, makeChapter, withTempDir } from "../test/helpers";
import type { Chapter } from "../types";
import type { DownloadOutcome } from "./download";
import { ChapterSyncError, ClosedError, EmptyBodyError } from "./errors";
import { type SyncDeps, syncChapters } from "./sync";
import { createWorkerPool } from "./worker-pool";

const IDS = [
  "0b9a8c3e-5d2f-4a61-9e07-3c8d1f2a4b5c",
  "7e1f5c2a-9b3d-4e8f-a0c1-d2e3f4a5b6c7",
  "1a2b3c4d-5e6f-4a8b-9c0d-1e2f3a4b5c6d",
];
const KEYS = ["C5qMPl0vSmGeBzyNHypLXA", "fh9cKps9To-gwdLj9KW2xw", "Gis8TV5vSoucDR4vOktcbQ"];
const GROUP_ID = "aaaaaaaa-bbbb-4ccc-8ddd-eeeeeeeeeeee";

type DownloadFn = SyncDeps["download"];

function syncDeps(download: DownloadFn, overrides: Partial<SyncDeps> = {}): SyncDeps {
  return {
    catalog: { getAtHomeServer: async () => ({ baseUrl: "https://pages.test", chapter: { hash: "h", data: [] } }) },
    http: createTestHttp(createFetchStub({}).fetchFn),
    pool: createWorkerPool(2),
    tempRoot: null,
    naming: { allowQuestionMarks: false },
    renameChapters: true,
    ignoredChapters: new Set(),
    download,
    ...overrides,
  };
}

function chapters(): Chapter[] {
  return IDS.map((id, i) => makeChapter(id, { chapter: String(i + 1) }));
}

describe("syncChapters", () => {
  it("downloads missing chapters in input order into their expected paths", async () => {
    await withTempDir(async (dir) => {
      const download = vi.fn<DownloadFn>(async () => "archived");

      const summary = await syncChapters(chapters(), dir, new Map(), false, syncDeps(download));

      expect(download.mock.calls.map(([chapter, archivePath]) => [chapter.id, archivePath])).toEqual([
        [IDS[0], path.join(dir, `Ch. 1 - ${KEYS[0]}.zip`)],
        [IDS[1], path.join(dir, `Ch. 2 - ${KEYS[1]}.zip`)],
        [IDS[2], path.join(dir, `Ch. 3 - ${KEYS[2]}.zip`)],
      ]);
      expect(summary).toEqual({ downloaded: 3, skipped: 0, renamed: 0, failures: [] });
    });
  });

  it("names archives with the resolved group names", async () => {
    await withTempDir(async (dir) => {
      const download = vi.fn<DownloadFn>(async () => "archived");
      const chapter = makeChapter(IDS[0], { volume: "2", chapter: "5", title: "Reunion" }, [GROUP_ID, "unknown"]);

      await syncChapters([chapter], dir, new Map([[GROUP_ID, "Night Owls"]]), false, syncDeps(download));

      expect(download.mock.calls[0]?.[1]).toBe(path.join(dir, `Vol. 2 Ch. 5 Reunion [Night Owls] - ${KEYS[0]}.zip`));
    });
  });

  it("skips chapters that already exist", async () => {
    await withTempDir(async (dir) => {
      await writeFile(path.join(dir, `Ch. 2 - ${KEYS[1]}.zip`), "zip");
      const download = vi.fn<DownloadFn>(async () => "archived");

      const summary = await syncChapters(chapters(), dir, new Map(), false, syncDeps(download));

      expect(download.mock.calls.map(([chapter]) => chapter.id)).toEqual([IDS[0], IDS[2]]);
      expect(summary).toEqual({ downloaded: 2, skipped: 1, renamed: 0, failures: [] });
    });
  });

  it("renames an archive stored under an older title instead of downloading it", async () => {
    await withTempDir(async (dir) => {
      await writeFile(path.join(dir, `Ch. 1 OldTitle - ${KEYS[0]}.zip`), "zip");
      const download = vi.fn<DownloadFn>(async () => "archived");

      const summary = await syncChapters(
        [makeChapter(IDS[0], { chapter: "1", title: "NewTitle" })],
        dir,
        new Map(),
        false,
        syncDeps(download),
      );

      expect(download).not.toHaveBeenCalled();
      expect(await readdir(dir)).toEqual([`Ch. 1 NewTitle - ${KEYS[0]}.zip`]);
      expect(summary).toEqual({ downloaded: 0, skipped: 0, renamed: 1, failures: [] });
    });
  });

  it("leaves a stale name alone when renaming is disabled", async () => {
    await withTempDir(async (dir) => {
      await writeFile(path.join(dir, `Ch. 1 OldTitle - ${KEYS[0]}.zip`), "zip");
      const download = vi.fn<DownloadFn>(async () => "archived");

      const summary = await syncChapters(
        [makeChapter(IDS[0], { chapter: "1", title: "NewTitle" })],
        dir,
        new Map(),
        false,
        syncDeps(download, { renameChapters: false }),
      );

      expect(download).not.toHaveBeenCalled();
      expect(await readdir(dir)).toEqual([`Ch. 1 OldTitle - ${KEYS[0]}.zip`]);
      expect(summary.skipped).toBe(1);
    });
  });

  it("skips ignored chapters", async () => {
    await withTempDir(async (dir) => {
      const download = vi.fn<DownloadFn>(async () => "archived");

      await syncChapters(chapters(), dir, new Map(), false, syncDeps(download, { ignoredChapters: new Set([IDS[1]]) }));

      expect(download.mock.calls.map(([chapter]) => chapter.id)).toEqual([IDS[0], IDS[2]]);
    });
  });

  it("keeps going after a failed chapter and reports it when continueOnError is set", async () => {
    await withTempDir(async (dir) => {
      const download = vi.fn<DownloadFn>(async (chapter): Promise<DownloadOutcome> => {
        if (chapter.id === IDS[1]) throw new EmptyBodyError("/tmp/002.png");
        return "archived";
      });

      const summary = await syncChapters(chapters(), dir, new Map(), true, syncDeps(download));

      expect(download.mock.calls.map(([chapter]) => chapter.id)).toEqual(IDS);
      expect(summary).toEqual({
        downloaded: 2,
        skipped: 0,
        renamed: 0,
        failures: [{ chapterId: IDS[1], message: "Wrote empty file to /tmp/002.png" }],
      });
    });
  });

  it("stops at the first failure without continueOnError", async () => {
    await withTempDir(async (dir) => {
      const download = vi.fn<DownloadFn>(async (chapter): Promise<DownloadOutcome> => {
        if (chapter.id === IDS[1]) throw new EmptyBodyError("/tmp/002.png");
        return "archived";
      });

      const error = await syncChapters(chapters(), dir, new Map(), false, syncDeps(download)).catch((e: unknown) => e);

      if (!(error instanceof ChapterSyncError)) throw new Error(`unexpected ${String(error)}`);
      expect(error.chapterId).toBe(IDS[1]);
      expect(error.cause).toBeInstanceOf(EmptyBodyError);
      expect(download.mock.calls.map(([chapter]) => chapter.id)).toEqual([IDS[0], IDS[1]]);
    });
  });

  it("propagates a shutdown even when continueOnError is set", async () => {
    await withTempDir(async (dir) => {
      const download = vi.fn<DownloadFn>(async () => {
        throw new ClosedError();
      });

      await expect(syncChapters(chapters(), dir, new Map(), true, syncDeps(download))).rejects.toBeInstanceOf(
        ClosedError,
      );
      expect(download).toHaveBeenCalledTimes(1);
    });
  });

  it("records a chapter with a malformed id as a failure", async () => {
    await withTempDir(async (dir) => {
      const download = vi.fn<DownloadFn>(async () => "archived");
      const summary = await syncChapters(
        [makeChapter("broken", { chapter: "1" }), ...chapters().slice(0, 1)],
        dir,
        new Map(),
        true,
        syncDeps(download),
      );

      expect(summary.failures).toEqual([{ chapterId: "broken", message: 'Invalid UUID string "broken"' }]);
      expect(summary.downloaded).toBe(1);
    });
  });
});
