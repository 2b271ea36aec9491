import { Command } from "commander";
import { CatalogClient } from "./lib/catalog-client";
import { type ShutdownToken, installSignalHandlers } from "./lib/closing";
import type { AppConfig } from "./lib/config";
import { errorMessage, isClosedError } from "./lib/errors";
import { GroupNameCache } from "./lib/groups";
import { HttpClient } from "./lib/http";
import { configureLogger, getLogFilePath, logError, logInfo } from "./lib/logger";
import { type SyncContext, syncManga, syncSingleChapter } from "./lib/manga";
import { createWorkerPool } from "./lib/worker-pool";

export const VERSION = "0.1.0";
const USER_AGENT = `chapter-mirror/${VERSION}`;

export function createSyncContext(config: AppConfig, shutdown: ShutdownToken): SyncContext {
  const http = new HttpClient({
    userAgent: USER_AGENT,
    timeoutMs: config.REQUEST_TIMEOUT_MS,
    shutdown,
  });
  const catalog = new CatalogClient(http, {
    baseUrl: config.API_BASE_URL,
    language: config.LANGUAGE,
    blockedGroups: config.BLOCKED_GROUPS,
    metadataDelayMs: config.METADATA_DELAY_MS,
  });

  return {
    config,
    catalog,
    http,
    pool: createWorkerPool(config.PARALLEL_DOWNLOADS),
    groups: new GroupNameCache((ids) => catalog.getGroups(ids)),
  };
}

export type CliAction = { kind: "manga"; mangaIds: string[] } | { kind: "chapter"; chapterId: string };

export function buildProgram(onAction: (action: CliAction) => void): Command {
  const program = new Command();

  program
    .name("chapter-mirror")
    .description("Mirror manga chapters into a local tree of zip archives")
    .version(VERSION)
    .argument("[mangaIds...]", "Manga UUIDs to sync")
    .action((mangaIds: string[]) => {
      if (mangaIds.length === 0) {
        program.help({ error: true });
      }
      onAction({ kind: "manga", mangaIds });
    });

  program
    .command("manga")
    .alias("m")
    .description("Sync any number of manga")
    .argument("<mangaIds...>", "Manga UUIDs to sync")
    .action((mangaIds: string[]) => {
      onAction({ kind: "manga", mangaIds });
    });

  program
    .command("chapter")
    .alias("c")
    .description("Download a single chapter")
    .argument("<chapterId>", "Chapter UUID")
    .action((chapterId: string) => {
      onAction({ kind: "chapter", chapterId });
    });

  return program;
}

export function parseCliArgs(argv: string[]): CliAction {
  const result: { action: CliAction | null } = { action: null };
  buildProgram((action) => {
    result.action = action;
  }).parse(argv, { from: "user" });

  if (!result.action) {
    throw new Error("No command given");
  }
  return result.action;
}

export async function runCli(argv: string[], config: AppConfig, shutdown: ShutdownToken): Promise<number> {
  const action = parseCliArgs(argv);
  configureLogger({ level: config.LOG_LEVEL, filePath: config.LOG_FILE || null });

  const removeSignalHandlers = installSignalHandlers(shutdown);
  const ctx = createSyncContext(config, shutdown);
  const logFile = getLogFilePath();
  logInfo(`chapter-mirror ${VERSION} output=${config.outputDirAbsolute}${logFile ? ` log=${logFile}` : ""}`);

  try {
    if (action.kind === "chapter") {
      await syncSingleChapter(action.chapterId, ctx);
      return 0;
    }

    for (const mangaId of action.mangaIds) {
      try {
        await syncManga(mangaId, ctx);
      } catch (error) {
        throw new Error(`Failed during ${mangaId}: ${errorMessage(error)}`, { cause: error });
      }
    }
    return 0;
  } catch (error) {
    if (isClosedError(error) || (error instanceof Error && isClosedError(error.cause))) {
      logInfo("Shut down before finishing");
    } else {
      logError(error instanceof Error ? error.stack || error.message : String(error));
    }
    return 1;
  } finally {
    removeSignalHandlers();
  }
}
