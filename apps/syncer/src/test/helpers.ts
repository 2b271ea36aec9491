import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { ShutdownToken } from "../lib/closing";
import { type FetchFn, HttpClient } from "../lib/http";
import type { Chapter } from "../types";

export type ZipEntry = {
  name: string;
  mode: number;
  size: number;
};

/** Reads entry names, unix modes and uncompressed sizes from a zip's central directory. */
export function listZipEntries(buffer: Buffer): ZipEntry[] {
  const eocd = buffer.lastIndexOf(Buffer.from([0x50, 0x4b, 0x05, 0x06]));
  if (eocd < 0) throw new Error("Not a zip archive");

  const count = buffer.readUInt16LE(eocd + 10);
  let offset = buffer.readUInt32LE(eocd + 16);
  const entries: ZipEntry[] = [];

  for (let i = 0; i < count; i += 1) {
    if (buffer.readUInt32LE(offset) !== 0x02014b50) throw new Error(`Bad central header at ${offset}`);
    const size = buffer.readUInt32LE(offset + 24);
    const nameLength = buffer.readUInt16LE(offset + 28);
    const extraLength = buffer.readUInt16LE(offset + 30);
    const commentLength = buffer.readUInt16LE(offset + 32);
    const externalAttributes = buffer.readUInt32LE(offset + 38);
    entries.push({
      name: buffer.toString("utf8", offset + 46, offset + 46 + nameLength),
      mode: externalAttributes >>> 16,
      size,
    });
    offset += 46 + nameLength + extraLength + commentLength;
  }
  return entries;
}

export async function withTempDir<T>(run: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), "chapter-mirror-test-"));
  try {
    return await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export type StubRoute = {
  body?: string | Uint8Array | null;
  status?: number;
  delayMs?: number;
  error?: Error;
};

/** In-process fetch that answers from a table keyed by full URL and records every call. */
export function createFetchStub(routes: Record<string, StubRoute | StubRoute[]>) {
  const calls: string[] = [];
  const served = new Map<string, number>();

  const fetchFn: FetchFn = async (input) => {
    const url = String(input);
    calls.push(url);
    const entry = routes[url];
    if (!entry) {
      return new Response("not found", { status: 404 });
    }

    const count = served.get(url) ?? 0;
    served.set(url, count + 1);
    const route = Array.isArray(entry) ? entry[Math.min(count, entry.length - 1)] : entry;

    if (route.delayMs) {
      await new Promise((resolve) => setTimeout(resolve, route.delayMs));
    }
    if (route.error) throw route.error;
    return new Response(route.body ?? null, { status: route.status ?? 200 });
  };

  return { fetchFn, calls };
}

export function createTestHttp(fetchFn: FetchFn, shutdown = new ShutdownToken()): HttpClient {
  return new HttpClient({ userAgent: "chapter-mirror-test", timeoutMs: 5_000, shutdown, fetchFn });
}

export function makeChapter(id: string, attributes: Chapter["attributes"] = {}, groupIds: string[] = []): Chapter {
  return {
    id,
    attributes,
    relationships: groupIds.map((groupId) => ({ id: groupId, type: "scanlation_group" })),
  };
}
