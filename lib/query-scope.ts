/**
 * Per-read cancellation and facility fan-out
 *
 * A QueryScope joins the caller's AbortSignal and the overall timeout into a
 * single signal handed to every request of one read. runPerFacility runs one
 * task per facility under a concurrency limit and turns a task's failure into
 * a FacilityQueryFailed for that facility, unless the scope was stopped.
 */

import pLimit from "p-limit";
import type { Facility } from "./atlas/types";
import {
  AllFacilitiesFailed,
  FacilityQueryFailed,
  QueryCancelled,
  QueryTimeout,
} from "./metrics/errors";
import type { FacilityTarget } from "./metrics/facility-selector";

export interface QueryScopeOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export class QueryScope {
  private readonly controller = new AbortController();
  private readonly parent?: AbortSignal;
  private readonly timeoutMs?: number;
  private timer?: NodeJS.Timeout;
  private timedOut = false;

  private readonly onParentAbort = () => this.controller.abort();

  constructor(options: QueryScopeOptions = {}) {
    this.parent = options.signal;
    this.timeoutMs = options.timeoutMs;

    if (this.parent?.aborted) {
      this.controller.abort();
    } else {
      this.parent?.addEventListener("abort", this.onParentAbort, {
        once: true,
      });
    }

    if (this.timeoutMs !== undefined && !this.controller.signal.aborted) {
      const timeoutMs = this.timeoutMs;
      this.timer = setTimeout(() => {
        this.timedOut = true;
        this.controller.abort();
      }, timeoutMs);
      this.timer.unref();
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * The error a stopped read rejects with
   */
  stopError(): QueryCancelled | QueryTimeout {
    return this.timedOut && this.timeoutMs !== undefined
      ? new QueryTimeout(this.timeoutMs)
      : new QueryCancelled();
  }

  throwIfStopped(): void {
    if (this.stopped) throw this.stopError();
  }

  /**
   * Map whatever a stopped read failed with to QueryCancelled / QueryTimeout;
   * other errors pass through unchanged
   */
  toQueryError(error: unknown): unknown {
    return this.stopped ? this.stopError() : error;
  }

  dispose(): void {
    if (this.timer) clearTimeout(this.timer);
    this.parent?.removeEventListener("abort", this.onParentAbort);
  }
}

export type FacilityOutcome<T> =
  | { status: "ok"; facility: Facility; value: T }
  | { status: "failed"; facility: Facility; error: FacilityQueryFailed };

/**
 * Run one task per facility, at most maxConcurrency at a time. Outcomes come
 * back in the order of targets, whatever order the tasks finish in.
 *
 * @throws AllFacilitiesFailed if there was at least one facility and every
 * task failed
 * @throws the scope's stop error once the read is cancelled or times out
 */
export async function runPerFacility<T>(
  targets: FacilityTarget[],
  maxConcurrency: number,
  scope: QueryScope,
  logTag: string,
  task: (target: FacilityTarget) => Promise<T>,
): Promise<FacilityOutcome<T>[]> {
  const limit = pLimit(maxConcurrency);

  const outcomes = await Promise.all(
    targets.map((target) =>
      limit(async (): Promise<FacilityOutcome<T>> => {
        scope.throwIfStopped();
        try {
          return { status: "ok", facility: target.facility, value: await task(target) };
        } catch (error) {
          if (scope.stopped) throw scope.stopError();

          const failure = new FacilityQueryFailed(
            target.facility.shortName,
            error,
          );
          console.error(`[${logTag}] ${failure.message}`);
          return { status: "failed", facility: target.facility, error: failure };
        }
      }),
    ),
  );

  scope.throwIfStopped();

  const failures = outcomes.flatMap((outcome) =>
    outcome.status === "failed" ? [outcome.error] : [],
  );
  if (targets.length > 0 && failures.length === targets.length) {
    throw new AllFacilitiesFailed(failures);
  }

  return outcomes;
}
