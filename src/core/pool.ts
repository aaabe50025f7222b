/**
 * Bounded worker pool over p-limit.
 *
 * Every submitted item gets a stable token (its submission index), and every
 * outcome carries that token, so completion order never decides which item an
 * error belongs to.
 */
import pLimit from "p-limit";

export type PoolOutcome<T, R> =
  | { token: number; item: T; status: "fulfilled"; value: R }
  | { token: number; item: T; status: "rejected"; reason: unknown }
  | { token: number; item: T; status: "skipped" };

export interface PoolOptions {
  width: number;
  /** Skip items not yet started once one item has been rejected. */
  stopOnError?: boolean;
  /** Called after each item settles, in completion order. */
  onSettled?: (done: number, total: number) => void | Promise<void>;
}

/** Returns outcomes indexed by submission token, each carrying its item. */
export async function mapPool<T, R>(
  items: readonly T[],
  worker: (item: T, token: number) => Promise<R>,
  opts: PoolOptions,
): Promise<PoolOutcome<T, R>[]> {
  const limit = pLimit(Math.max(1, Math.floor(opts.width)));
  let stopped = false;
  let done = 0;

  const run = async (item: T, token: number): Promise<PoolOutcome<T, R>> => {
    let outcome: PoolOutcome<T, R>;
    if (stopped) {
      outcome = { token, item, status: "skipped" };
    } else {
      try {
        outcome = { token, item, status: "fulfilled", value: await worker(item, token) };
      } catch (reason) {
        if (opts.stopOnError) stopped = true;
        outcome = { token, item, status: "rejected", reason };
      }
    }
    done++;
    await opts.onSettled?.(done, items.length);
    return outcome;
  };

  return Promise.all(items.map((item, token) => limit(() => run(item, token))));
}
