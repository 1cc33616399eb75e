/**
 * @fileoverview The outcome record of a pull: which entry IDs succeeded,
 * failed, timed out, or were never attempted. Values are immutable; batches
 * are combined with `merge`, a disjoint union, and a run ends with exactly one
 * call to `finalize`.
 * @module src/services/KEGG/pull/pullResult
 */

import { BaseErrorCode, McpError } from "../../../types-global/errors.js";

export type PullStatus = "in-progress" | "completed" | "aborted";

/** Outcome classes a single entry ID can end up in. */
export type EntryOutcome = "successful" | "failed" | "timed-out";

interface PullResultState {
  successful: readonly string[];
  failed: readonly string[];
  timedOut: readonly string[];
  remaining: readonly string[];
  status: PullStatus;
  startedAt: number;
  elapsedMs: number | null;
}

export class PullResult {
  private constructor(private readonly state: PullResultState) {}

  /** An empty, in-progress result whose timer starts at `startedAt`. */
  public static empty(startedAt: number = Date.now()): PullResult {
    return new PullResult({
      successful: [],
      failed: [],
      timedOut: [],
      remaining: [],
      status: "in-progress",
      startedAt,
      elapsedMs: null,
    });
  }

  /** An in-progress result classifying every ID of `entryIds` the same way. */
  public static of(
    outcome: EntryOutcome,
    entryIds: readonly string[],
    startedAt?: number,
  ): PullResult {
    return PullResult.empty(startedAt).with(outcome, entryIds);
  }

  public get successfulEntryIds(): readonly string[] {
    return this.state.successful;
  }

  public get failedEntryIds(): readonly string[] {
    return this.state.failed;
  }

  public get timedOutEntryIds(): readonly string[] {
    return this.state.timedOut;
  }

  /** IDs never dispatched. Only non-empty when the pull was aborted. */
  public get remainingEntryIds(): readonly string[] {
    return this.state.remaining;
  }

  public get status(): PullStatus {
    return this.state.status;
  }

  /** Elapsed milliseconds; null until finalized. */
  public get elapsedMs(): number | null {
    return this.state.elapsedMs;
  }

  public get numUnsuccessful(): number {
    return this.state.failed.length + this.state.timedOut.length;
  }

  /** Number of IDs classified so far (remaining IDs excluded). */
  public get numProcessed(): number {
    return this.state.successful.length + this.numUnsuccessful;
  }

  /** Returns a copy with `entryIds` added under `outcome`. */
  public with(outcome: EntryOutcome, entryIds: readonly string[]): PullResult {
    return this.merge(
      new PullResult({
        successful: outcome === "successful" ? entryIds : [],
        failed: outcome === "failed" ? entryIds : [],
        timedOut: outcome === "timed-out" ? entryIds : [],
        remaining: [],
        status: "in-progress",
        startedAt: this.state.startedAt,
        elapsedMs: null,
      }),
    );
  }

  /**
   * Disjoint union of two in-progress results. The earlier start time wins.
   * @throws {McpError} `PULL_RESULT_CONFLICT` when an ID appears in both.
   */
  public merge(other: PullResult): PullResult {
    this.assertInProgress("merge");
    other.assertInProgress("merge");

    const [smaller, larger] =
      this.numProcessed <= other.numProcessed ? [this, other] : [other, this];
    const indexed = new Set(smaller.allEntryIds());
    const overlap =
      indexed.size === 0 ? [] : larger.entryIdsIn(indexed);
    if (overlap.length > 0) {
      throw new McpError(
        BaseErrorCode.PULL_RESULT_CONFLICT,
        `Cannot merge pull results that share entry IDs: ${overlap.join(", ")}`,
        { overlap },
      );
    }

    return new PullResult({
      successful: [...this.state.successful, ...other.state.successful],
      failed: [...this.state.failed, ...other.state.failed],
      timedOut: [...this.state.timedOut, ...other.state.timedOut],
      remaining: [],
      status: "in-progress",
      startedAt: Math.min(this.state.startedAt, other.state.startedAt),
      elapsedMs: null,
    });
  }

  /**
   * Stops the timer and fixes the final shape. Every set is ordered by the
   * position of its IDs in `inputOrder`. A non-empty `remaining` marks the
   * result as aborted.
   */
  public finalize(
    inputOrder: readonly string[],
    remaining: readonly string[] = [],
    finishedAt: number = Date.now(),
  ): PullResult {
    this.assertInProgress("finalize");

    const position = new Map(inputOrder.map((entryId, index) => [entryId, index]));
    const byPosition = (entryIds: readonly string[]): string[] =>
      [...entryIds].sort(
        (a, b) =>
          (position.get(a) ?? Number.MAX_SAFE_INTEGER) -
          (position.get(b) ?? Number.MAX_SAFE_INTEGER),
      );

    return new PullResult({
      successful: byPosition(this.state.successful),
      failed: byPosition(this.state.failed),
      timedOut: byPosition(this.state.timedOut),
      remaining: byPosition(remaining),
      status: remaining.length > 0 ? "aborted" : "completed",
      startedAt: this.state.startedAt,
      elapsedMs: Math.max(0, finishedAt - this.state.startedAt),
    });
  }

  /** IDs of this result that `index` contains, without copying the sets. */
  private entryIdsIn(index: ReadonlySet<string>): string[] {
    const { successful, failed, timedOut } = this.state;
    return [successful, failed, timedOut].flatMap((entryIds) =>
      entryIds.filter((entryId) => index.has(entryId)),
    );
  }

  private allEntryIds(): string[] {
    return [...this.state.successful, ...this.state.failed, ...this.state.timedOut];
  }

  private assertInProgress(action: string): void {
    if (this.state.status !== "in-progress") {
      throw new McpError(
        BaseErrorCode.INTERNAL_ERROR,
        `Cannot ${action} a pull result that is already ${this.state.status}`,
      );
    }
  }
}
