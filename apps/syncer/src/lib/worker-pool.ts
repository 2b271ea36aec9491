import pLimit, { type LimitFunction } from "p-limit";

export type WorkerPool = LimitFunction;

export function createWorkerPool(size: number): WorkerPool {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Worker pool size must be a positive integer, got ${size}`);
  }
  return pLimit(size);
}
