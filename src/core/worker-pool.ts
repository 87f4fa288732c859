import type { ParallelConfig } from "../types/config.js";
import { PoolTimeoutError } from "./errors.js";

export type PoolTask<T> = () => Promise<T>;

export type PoolResult<T> = { ok: true; value: T } | { ok: false; error: Error };

export type PoolOptions = {
  /** Maximum number of tasks running at once. */
  concurrency: number;
  /** Wall-clock budget for the whole batch. */
  deadlineMs: number;
};

export const DEFAULT_POOL_OPTIONS: PoolOptions = {
  concurrency: 4,
  deadlineMs: 5 * 60 * 1000,
};

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * Bounded worker pool.
 *
 * At most `concurrency` tasks run at once. Results are returned in submission
 * order; a failing task never affects its siblings. When the deadline passes,
 * dispatch stops and every task without a result (never started, or still
 * running) is reported as a PoolTimeoutError. Running tasks are not aborted;
 * whatever they produce afterwards is discarded.
 */
export function runPool<T>(tasks: PoolTask<T>[], opts: Partial<PoolOptions> = {}): Promise<PoolResult<T>[]> {
  const requested = Math.floor(opts.concurrency ?? DEFAULT_POOL_OPTIONS.concurrency);
  const concurrency = requested >= 1 ? requested : DEFAULT_POOL_OPTIONS.concurrency;
  const deadlineMs =
    opts.deadlineMs !== undefined && opts.deadlineMs > 0 ? opts.deadlineMs : DEFAULT_POOL_OPTIONS.deadlineMs;

  if (tasks.length === 0) return Promise.resolve([]);

  return new Promise((resolve) => {
    const results: Array<PoolResult<T> | undefined> = new Array<PoolResult<T> | undefined>(tasks.length).fill(undefined);
    let next = 0;
    let active = 0;
    let settled = 0;
    let expired = false;
    let finished = false;

    const finish = (): void => {
      if (finished) return;
      finished = true;
      clearTimeout(timer);
      resolve(results.map((r, i) => r ?? { ok: false, error: new PoolTimeoutError(i, deadlineMs) }));
    };

    const timer = setTimeout(() => {
      expired = true;
      finish();
    }, deadlineMs);

    const record = (index: number, result: PoolResult<T>): void => {
      active--;
      settled++;
      if (expired) return;
      results[index] = result;
      dispatch();
    };

    const start = (index: number): void => {
      let pending: Promise<T>;
      try {
        pending = tasks[index]();
      } catch (e) {
        pending = Promise.reject(toError(e));
      }
      void pending.then(
        (value) => record(index, { ok: true, value }),
        (e: unknown) => record(index, { ok: false, error: toError(e) }),
      );
    };

    const dispatch = (): void => {
      while (!expired && active < concurrency && next < tasks.length) {
        const index = next++;
        active++;
        start(index);
      }
      if (settled === tasks.length) finish();
    };

    dispatch();
  });
}

/** Pool settings for read-only collection from a box. */
export function queryPoolOptions(parallel: ParallelConfig): PoolOptions {
  return {
    concurrency: parallel.enabled ? parallel.query_workers : 1,
    deadlineMs: parallel.query_timeout_s * 1000,
  };
}

/** Pool settings for running per-manager reconcile groups. */
export function applyPoolOptions(parallel: ParallelConfig): PoolOptions {
  return {
    concurrency: parallel.enabled ? parallel.apply_workers : 1,
    deadlineMs: parallel.apply_timeout_s * 1000,
  };
}
