import { writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { ClosedError, errorMessage } from "./errors";
import { logError, logInfo } from "./logger";

const TERM_SIGNALS = ["SIGINT", "SIGTERM", "SIGHUP"] as const;

/**
 * Process-wide close flag. Set at most once, either by a termination signal or by a fatal error.
 * Every fetch entry point checks it before touching the network; in-flight requests are left to
 * finish or time out on their own.
 */
export class ShutdownToken {
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns true only for the call that actually closed the token. */
  close(): boolean {
    if (this.closed) return false;
    this.closed = true;
    return true;
  }

  throwIfClosed(): void {
    if (this.closed) {
      throw new ClosedError();
    }
  }
}

export function crashMarkerPath(pid = process.pid): string {
  return path.join(tmpdir(), `chapter-mirror_crash_${pid}`);
}

// Only the first fatal error gets a crash marker.
export function fatal(token: ShutdownToken, message: string): void {
  logError(message);

  if (!token.close()) return;

  const markerPath = crashMarkerPath();
  try {
    writeFileSync(markerPath, message, { flag: "wx" });
  } catch (error) {
    logError(`Couldn't open ${markerPath} for logging fatal error: ${errorMessage(error)}`);
  }
}

type SignalListener = (signal: NodeJS.Signals) => void;

export type SignalSource = {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
};

/** The first signal closes the token; any later one exits with status 1. Returns a remover. */
export function installSignalHandlers(
  token: ShutdownToken,
  options: { exit?: (code: number) => void; source?: SignalSource } = {},
): () => void {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const source = options.source ?? process;

  const handler: SignalListener = (signal) => {
    if (!token.close()) {
      exit(1);
      return;
    }
    logInfo(`Received signal ${signal}, shutting down`);
  };

  for (const signal of TERM_SIGNALS) {
    source.on(signal, handler);
  }

  return () => {
    for (const signal of TERM_SIGNALS) {
      source.off(signal, handler);
    }
  };
}
