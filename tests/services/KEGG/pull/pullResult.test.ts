import { describe, expect, it } from "vitest";
import { PullResult } from "../../../../src/services/KEGG/pull/pullResult.js";
import { BaseErrorCode } from "../../../../src/types-global/errors.js";

describe("PullResult", () => {
  it("starts empty and in progress", () => {
    const result = PullResult.empty(1000);

    expect(result.status).toBe("in-progress");
    expect(result.numProcessed).toBe(0);
    expect(result.elapsedMs).toBeNull();
  });

  it("merges disjoint results", () => {
    const merged = PullResult.of("successful", ["a", "b"], 2000)
      .merge(PullResult.of("failed", ["c"], 1000))
      .merge(PullResult.of("timed-out", ["d"], 3000));

    expect(merged.successfulEntryIds).toEqual(["a", "b"]);
    expect(merged.failedEntryIds).toEqual(["c"]);
    expect(merged.timedOutEntryIds).toEqual(["d"]);
    expect(merged.numUnsuccessful).toBe(2);
    expect(merged.numProcessed).toBe(4);
    expect(merged.finalize(["a", "b", "c", "d"], [], 4500).elapsedMs).toBe(3500);
  });

  it("rejects a merge of overlapping results", () => {
    const left = PullResult.of("successful", ["a", "b"]);
    const right = PullResult.of("failed", ["b", "c"]);

    expect(() => left.merge(right)).toThrow("Cannot merge pull results that share entry IDs: b");
    try {
      left.merge(right);
    } catch (error) {
      expect(error).toMatchObject({ code: BaseErrorCode.PULL_RESULT_CONFLICT });
    }
  });

  it("does not mutate merged operands", () => {
    const left = PullResult.of("successful", ["a"]);
    left.merge(PullResult.of("successful", ["b"]));

    expect(left.successfulEntryIds).toEqual(["a"]);
  });

  it("orders every set by input position on finalize", () => {
    const result = PullResult.empty(0)
      .with("successful", ["e", "a"])
      .with("failed", ["d", "b"])
      .finalize(["a", "b", "c", "d", "e", "f"], ["f", "c"], 10);

    expect(result.successfulEntryIds).toEqual(["a", "e"]);
    expect(result.failedEntryIds).toEqual(["b", "d"]);
    expect(result.remainingEntryIds).toEqual(["c", "f"]);
    expect(result.status).toBe("aborted");
    expect(result.elapsedMs).toBe(10);
  });

  it("completes when nothing remains", () => {
    expect(PullResult.of("successful", ["a"]).finalize(["a"]).status).toBe("completed");
  });

  it("can only be finalized once", () => {
    const finalized = PullResult.of("successful", ["a"]).finalize(["a"]);

    expect(() => finalized.finalize(["a"])).toThrow(
      "Cannot finalize a pull result that is already completed",
    );
    expect(() => finalized.merge(PullResult.empty())).toThrow(
      "Cannot merge a pull result that is already completed",
    );
  });
});

describe("PullResult merge order", () => {
  const input = ["a", "b", "c", "d", "e", "f", "g"];

  const finalSets = (result: PullResult) => {
    const finalized = result.finalize(input, [], 10);
    return {
      successful: finalized.successfulEntryIds,
      failed: finalized.failedEntryIds,
      timedOut: finalized.timedOutEntryIds,
      remaining: finalized.remainingEntryIds,
      status: finalized.status,
    };
  };

  it("finalizes to the same sets however the batches are ordered or grouped", () => {
    const first = PullResult.of("successful", ["a", "b"], 0);
    const second = PullResult.of("failed", ["c"], 0).with("successful", ["d"]);
    const third = PullResult.of("timed-out", ["e", "f"], 0);
    const fourth = PullResult.of("successful", ["g"], 0);

    const inOrder = [first, second, third, fourth].reduce(
      (running, partial) => running.merge(partial),
      PullResult.empty(0),
    );
    const shuffled = [third, first, fourth, second].reduce(
      (running, partial) => running.merge(partial),
      PullResult.empty(0),
    );
    const regrouped = fourth.merge(second).merge(third.merge(first));

    const expected = {
      successful: ["a", "b", "d", "g"],
      failed: ["c"],
      timedOut: ["e", "f"],
      remaining: [],
      status: "completed",
    };
    expect(finalSets(inOrder)).toEqual(expected);
    expect(finalSets(shuffled)).toEqual(expected);
    expect(finalSets(regrouped)).toEqual(expected);
  });

  it("reports the overlap whichever operand is larger", () => {
    const running = PullResult.of("successful", ["a", "b", "c"]).with("failed", ["d"]);
    const batch = PullResult.of("timed-out", ["d", "e"]);

    expect(() => running.merge(batch)).toThrow("Cannot merge pull results that share entry IDs: d");
    expect(() => batch.merge(running)).toThrow("Cannot merge pull results that share entry IDs: d");
  });

  it("merges with an empty result", () => {
    const merged = PullResult.empty(0).merge(PullResult.of("failed", ["a"], 0));

    expect(merged.failedEntryIds).toEqual(["a"]);
  });
});
