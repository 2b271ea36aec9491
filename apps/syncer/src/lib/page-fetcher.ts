import { EmptyBodyError, SyncError, errorMessage } from "./errors";
import { type HttpClient, writeResponseToFile } from "./http";
import { logError, logTrace } from "./logger";

export const PAGE_FETCH_RETRIES = 3;

async function fetchOnce(http: HttpClient, url: string, destination: string): Promise<void> {
  const response = await http.get(url);
  const written = await writeResponseToFile(response, destination);
  if (written === 0) {
    throw new EmptyBodyError(destination);
  }
}

/**
 * Downloads one page into destination. The whole fetch is retried up to PAGE_FETCH_RETRIES more
 * times without delay; the last error is thrown once attempts run out. Non-retryable sync errors,
 * shutdowns included, end the loop at once.
 */
export async function fetchPage(http: HttpClient, url: string, destination: string): Promise<void> {
  logTrace(`Downloading ${url} to ${destination}`);

  let lastError: unknown;
  for (let attempt = 0; attempt <= PAGE_FETCH_RETRIES; attempt += 1) {
    if (attempt > 0) {
      logError(`Retrying download of ${url} due to ${errorMessage(lastError)}`);
    }
    try {
      await fetchOnce(http, url, destination);
      return;
    } catch (error) {
      if (error instanceof SyncError && !error.retryable) throw error;
      lastError = error;
    }
  }
  throw lastError;
}
