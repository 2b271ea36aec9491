import { URL } from "node:url";
import { z } from "zod";
import type { AtHomeServer, Chapter, ChapterFeedPage, Group, Manga } from "../types";
import { HttpStatusError, PaginationError, errorMessage, isClosedError } from "./errors";
import type { HttpClient } from "./http";
import { logDebug, logTrace } from "./logger";

export const FEED_PAGE_SIZE = 100;
const GROUP_CHUNK_SIZE = 50;
const TRANSPORT_RETRIES = 3;

type QueryValue = string | number | string[] | undefined;

const emptyAsAbsent = z
  .string()
  .nullish()
  .transform((v) => (v ? v : undefined));

const nullAsAbsent = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

const chapterSchema = z.object({
  id: z.string(),
  attributes: z.object({
    volume: emptyAsAbsent,
    chapter: nullAsAbsent,
    title: emptyAsAbsent,
    // Any string marks the chapter as external, even an empty one.
    externalUrl: nullAsAbsent,
  }),
  relationships: z.array(z.object({ id: z.string(), type: z.string() })),
});

const mangaSchema = z.object({
  id: z.string(),
  attributes: z.object({
    title: z.record(z.string()),
  }),
});

const chapterResponseSchema = z.object({ data: chapterSchema });
const mangaResponseSchema = z.object({ data: mangaSchema });
const feedPageSchema = z.object({
  data: z.array(chapterSchema),
  total: z.number().int().nonnegative(),
});
const groupListSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      attributes: z.object({ name: z.string() }),
    }),
  ),
});
const atHomeSchema = z.object({
  baseUrl: z.string(),
  chapter: z.object({
    hash: z.string(),
    data: z.array(z.string()),
  }),
});

async function sleep(ms: number): Promise<void> {
  if (ms <= 0) return;
  await new Promise((resolve) => setTimeout(resolve, ms));
}

export type CatalogClientOptions = {
  baseUrl: string;
  language: string;
  blockedGroups: ReadonlySet<string>;
  /** Applied before every metadata request, never before page downloads. */
  metadataDelayMs: number;
};

export class CatalogClient {
  constructor(
    private readonly http: HttpClient,
    private readonly options: CatalogClientOptions,
  ) {}

  private buildUrl(pathname: string, query?: Record<string, QueryValue>): URL {
    const url = new URL(pathname, this.options.baseUrl);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined || value === "") continue;
        if (Array.isArray(value)) {
          for (const item of value) url.searchParams.append(key, item);
        } else {
          url.searchParams.append(key, String(value));
        }
      }
    }
    return url;
  }

  private async getWithRetry(url: URL): Promise<Response> {
    let lastError: unknown;
    for (let attempt = 0; attempt <= TRANSPORT_RETRIES; attempt += 1) {
      try {
        return await this.http.get(url);
      } catch (error) {
        // Status errors and shutdowns are final; only transport failures are retried.
        if (isClosedError(error) || error instanceof HttpStatusError) throw error;
        lastError = error;
        if (attempt < TRANSPORT_RETRIES) {
          logDebug(`Retrying request ${url.toString()} after failure ${errorMessage(error)}`);
        }
      }
    }
    throw lastError;
  }

  private async fetchJson<T>(url: URL, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    this.http.shutdown.throwIfClosed();
    await sleep(this.options.metadataDelayMs);

    logTrace(`GET ${url.toString()}`);
    const response = await this.getWithRetry(url);
    return schema.parse(await response.json());
  }

  async getManga(id: string): Promise<Manga> {
    const body = await this.fetchJson(this.buildUrl(`/manga/${encodeURIComponent(id)}`), mangaResponseSchema);
    return body.data;
  }

  async getChapter(id: string): Promise<Chapter> {
    const body = await this.fetchJson(this.buildUrl(`/chapter/${encodeURIComponent(id)}`), chapterResponseSchema);
    return body.data;
  }

  async getAtHomeServer(chapterId: string): Promise<AtHomeServer> {
    return this.fetchJson(this.buildUrl(`/at-home/server/${encodeURIComponent(chapterId)}`), atHomeSchema);
  }

  async getChapterFeedPage(mangaId: string, offset: number): Promise<ChapterFeedPage> {
    return this.fetchJson(
      this.buildUrl(`/manga/${encodeURIComponent(mangaId)}/feed`, {
        limit: FEED_PAGE_SIZE,
        "translatedLanguage[]": this.options.language,
        "order[chapter]": "desc",
        offset,
      }),
      feedPageSchema,
    );
  }

  /** Every chapter of the manga in the configured language, minus externally hosted and blocked ones. */
  async getChapterFeed(mangaId: string): Promise<Chapter[]> {
    const chapters: Chapter[] = [];
    let total = 1;
    let offset = 0;

    while (offset < total) {
      const page = await this.getChapterFeedPage(mangaId, offset);
      total = page.total;

      if (page.data.length !== FEED_PAGE_SIZE && offset + page.data.length < total) {
        throw new PaginationError(
          `Manga ${mangaId}: invalid chapter pagination. Requested ${FEED_PAGE_SIZE} chapters at offset ${offset} ` +
            `with ${total} total but got ${page.data.length}`,
        );
      }

      for (const chapter of page.data) {
        if (chapter.attributes.externalUrl !== undefined) {
          logDebug(`Filtering out chapter ${chapter.id} with external url`);
          continue;
        }
        if (chapter.relationships.some((r) => r.type === "scanlation_group" && this.options.blockedGroups.has(r.id))) {
          logDebug(`Filtering out chapter ${chapter.id} with blocked group`);
          continue;
        }
        chapters.push(chapter);
      }

      offset += FEED_PAGE_SIZE;
    }

    return chapters;
  }

  async getGroups(ids: string[]): Promise<Group[]> {
    const groups: Group[] = [];
    for (let i = 0; i < ids.length; i += GROUP_CHUNK_SIZE) {
      const chunk = ids.slice(i, i + GROUP_CHUNK_SIZE);
      const body = await this.fetchJson(this.buildUrl("/group", { "ids[]": chunk, limit: chunk.length }), groupListSchema);
      for (const group of body.data) {
        groups.push({ id: group.id, name: group.attributes.name });
      }
    }
    return groups;
  }
}

export function englishOrFirst(title: Record<string, string>): string | undefined {
  return title.en ?? Object.values(title)[0];
}
