import { open } from "node:fs/promises";
import type { ShutdownToken } from "./closing";
import { HttpStatusError } from "./errors";

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type HttpClientOptions = {
  userAgent: string;
  timeoutMs: number;
  shutdown: ShutdownToken;
  fetchFn?: FetchFn;
};

export class HttpClient {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  get shutdown(): ShutdownToken {
    return this.options.shutdown;
  }

  /** One GET; the timeout covers reading the body as well. Non-2xx responses throw. */
  async get(url: string | URL): Promise<Response> {
    this.options.shutdown.throwIfClosed();
    const response = await this.fetchFn(url, {
      headers: { "user-agent": this.options.userAgent },
      signal: AbortSignal.timeout(this.options.timeoutMs),
      redirect: "follow",
    });

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new HttpStatusError(response.status, String(url), text.slice(0, 200));
    }
    return response;
  }
}

/** Streams the body into filePath, truncating any previous content. Resolves to the byte count. */
export async function writeResponseToFile(response: Response, filePath: string): Promise<number> {
  const file = await open(filePath, "w").catch(async (error: unknown) => {
    await response.body?.cancel();
    throw error;
  });
  if (!response.body) {
    await file.close();
    return 0;
  }

  const reader = response.body.getReader();
  let written = 0;
  try {
    while (true) {
      const chunk = await reader.read();
      if (chunk.done) break;
      if (!chunk.value || chunk.value.length === 0) continue;
      await file.write(chunk.value);
      written += chunk.value.length;
    }
  } finally {
    try {
      reader.releaseLock();
    } catch {
      // Already released when the stream errored.
    }
    await file.close();
  }
  return written;
}
