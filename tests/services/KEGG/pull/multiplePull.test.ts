import { describe, expect, it } from "vitest";
import type { KeggEntryField } from "../../../../src/services/KEGG/core/keggConstants.js";
import { KeggRequester } from "../../../../src/services/KEGG/core/keggRequester.js";
import { KeggRestService } from "../../../../src/services/KEGG/core/keggRestService.js";
import { BatchRequester } from "../../../../src/services/KEGG/pull/batchRequester.js";
import { MemoryEntrySaver } from "../../../../src/services/KEGG/pull/entrySavers.js";
import {
  cleanEntryIds,
  isThresholdExceeded,
  MultiplePullOptions,
  planBatches,
  PullProgress,
  SequentialMultiplePull,
  SinglePullFactory,
} from "../../../../src/services/KEGG/pull/multiplePull.js";
import { PullResult } from "../../../../src/services/KEGG/pull/pullResult.js";
import { SinglePull } from "../../../../src/services/KEGG/pull/singlePull.js";
import { BaseErrorCode } from "../../../../src/types-global/errors.js";
import {
  FakeHandler,
  FakeKeggTransport,
  keggGet,
  noSleep,
  testContext,
} from "../../../helpers/fakeKegg.js";

const compoundIds = (count: number): string[] =>
  Array.from({ length: count }, (_, index) => `cpd:C${String(index + 1).padStart(5, "0")}`);

const factoryFor = (
  handler: FakeHandler,
  entryField?: KeggEntryField,
): { transport: FakeKeggTransport; saver: MemoryEntrySaver; createSinglePull: SinglePullFactory } => {
  const transport = new FakeKeggTransport(handler);
  const rest = new KeggRestService(
    new KeggRequester(transport, { nTries: 1 }, noSleep),
    "https://rest.kegg.jp",
  );
  const saver = new MemoryEntrySaver();
  return {
    transport,
    saver,
    createSinglePull: () => new SinglePull(new BatchRequester(rest), saver, entryField),
  };
};

const sequential = (handler: FakeHandler, options: MultiplePullOptions = {}) => {
  const fake = factoryFor(handler, options.entryField);
  return { ...fake, multiplePull: new SequentialMultiplePull(fake.createSinglePull, options) };
};

describe("cleanEntryIds", () => {
  it("trims, drops blanks, and keeps the first of repeated IDs", () => {
    expect(cleanEntryIds([" cpd:C00002 ", "", "cpd:C00001", "  ", "cpd:C00002"], testContext())).toEqual([
      "cpd:C00002",
      "cpd:C00001",
    ]);
  });

  it("rejects input with no usable IDs", () => {
    expect(() => cleanEntryIds(["", " "], testContext())).toThrow("No entry IDs were provided to pull");
  });
});

describe("planBatches", () => {
  it("slices contiguously with a short last batch", () => {
    expect(planBatches(["a", "b", "c", "d", "e"], 2, () => true)).toEqual({
      batches: [["a", "b"], ["c", "d"], ["e"]],
      malformed: [],
    });
  });

  it("sets aside rejected IDs and closes a batch before it becomes unacceptable", () => {
    const accepts = (batch: readonly string[]) =>
      !batch.includes("bad") && batch.join("").length <= 3;

    expect(planBatches(["a", "bb", "bad", "c", "dd"], 10, accepts)).toEqual({
      batches: [["a", "bb"], ["c", "dd"]],
      malformed: ["bad"],
    });
  });
});

describe("isThresholdExceeded", () => {
  const result = PullResult.of("failed", ["a", "b"]);

  it("compares strictly", () => {
    expect(isThresholdExceeded({ kind: "ratio", value: 0.5 }, result, 4)).toBe(false);
    expect(isThresholdExceeded({ kind: "ratio", value: 0.49 }, result, 4)).toBe(true);
    expect(isThresholdExceeded({ kind: "count", value: 2 }, result, 4)).toBe(false);
    expect(isThresholdExceeded({ kind: "count", value: 1 }, result, 4)).toBe(true);
  });
});

describe("SequentialMultiplePull", () => {
  it("requests 11 IDs as a batch of 10 and a batch of 1", async () => {
    const ids = compoundIds(11);
    const { transport, saver, multiplePull } = sequential(keggGet());

    const result = await multiplePull.pull(ids, testContext());

    expect(transport.calls.map((call) => call.url)).toEqual([
      `https://rest.kegg.jp/get/${ids.slice(0, 10).join("+")}`,
      "https://rest.kegg.jp/get/cpd:C00011",
    ]);
    expect(result.status).toBe("completed");
    expect(result.successfulEntryIds).toEqual(ids);
    expect(saver.entries.size).toBe(11);
  });

  it("pulls three compounds in one request", async () => {
    const { transport, multiplePull } = sequential(keggGet());

    const result = await multiplePull.pull(["cpd:C00001", "cpd:C00002", "cpd:C00003"], testContext());

    expect(transport.calls).toHaveLength(1);
    expect(result.successfulEntryIds).toEqual(["cpd:C00001", "cpd:C00002", "cpd:C00003"]);
    expect(result.numUnsuccessful).toBe(0);
  });

  it("fails an ID KEGG does not know", async () => {
    const { multiplePull } = sequential(keggGet(() => false));

    const result = await multiplePull.pull(["br:br03220"], testContext());

    expect(result.status).toBe("completed");
    expect(result.failedEntryIds).toEqual(["br:br03220"]);
  });

  it("sends cleaned input", async () => {
    const { transport, multiplePull } = sequential(keggGet());

    await multiplePull.pull([" cpd:C00001", "", "cpd:C00001", "cpd:C00002 "], testContext());

    expect(transport.calls.map((call) => call.url)).toEqual([
      "https://rest.kegg.jp/get/cpd:C00001+cpd:C00002",
    ]);
  });

  it("pulls one entry per request when forced or when the field requires it", async () => {
    const forced = sequential(keggGet(), { forceSingleEntry: true, batchSize: 5 });
    const json = sequential(keggGet(), { entryField: "json" });

    await forced.multiplePull.pull(compoundIds(3), testContext());
    await json.multiplePull.pull(compoundIds(2), testContext());

    expect(forced.multiplePull.effectiveBatchSize).toBe(1);
    expect(forced.transport.calls).toHaveLength(3);
    expect(json.transport.calls.map((call) => call.url)).toEqual([
      "https://rest.kegg.jp/get/cpd:C00001/json",
      "https://rest.kegg.jp/get/cpd:C00002/json",
    ]);
  });

  it("aborts with the undispatched IDs once the threshold is exceeded", async () => {
    const ids = compoundIds(6);
    const { transport, multiplePull } = sequential(keggGet(() => false), {
      batchSize: 2,
      unsuccessfulThreshold: { kind: "count", value: 1 },
    });

    const result = await multiplePull.pull(ids, testContext());

    expect(transport.calls).toHaveLength(1);
    expect(result.status).toBe("aborted");
    expect(result.failedEntryIds).toEqual(ids.slice(0, 2));
    expect(result.remainingEntryIds).toEqual(ids.slice(2));
  });

  it("does not abort after the last batch", async () => {
    const { multiplePull } = sequential(keggGet(() => false), {
      unsuccessfulThreshold: { kind: "count", value: 0 },
    });

    const result = await multiplePull.pull(["cpd:C00001"], testContext());

    expect(result.status).toBe("completed");
    expect(result.remainingEntryIds).toEqual([]);
  });

  it("keeps going while the ratio is not exceeded", async () => {
    const ids = compoundIds(4);
    const { multiplePull } = sequential(keggGet((entryId) => entryId !== ids[0]), {
      batchSize: 1,
      unsuccessfulThreshold: { kind: "ratio", value: 0.25 },
    });

    const result = await multiplePull.pull(ids, testContext());

    expect(result.status).toBe("completed");
    expect(result.failedEntryIds).toEqual([ids[0]]);
    expect(result.successfulEntryIds).toEqual(ids.slice(1));
  });

  it("reports progress after every batch", async () => {
    const progress: PullProgress[] = [];
    const { multiplePull } = sequential(keggGet((entryId) => entryId !== "cpd:C00003"), {
      batchSize: 2,
      onProgress: (update) => progress.push(update),
    });

    await multiplePull.pull(compoundIds(3), testContext());

    expect(progress).toEqual([
      { completedBatches: 1, totalBatches: 2, processedEntryIds: 2, totalEntryIds: 3, numUnsuccessful: 0 },
      { completedBatches: 2, totalBatches: 2, processedEntryIds: 3, totalEntryIds: 3, numUnsuccessful: 1 },
    ]);
  });

  it.each([0, 1, 1.5])("rejects a ratio threshold of %s", (value) => {
    expect(
      () =>
        new SequentialMultiplePull(factoryFor(keggGet()).createSinglePull, {
          unsuccessfulThreshold: { kind: "ratio", value },
        }),
    ).toThrow(
      `Unsuccessful threshold of ${value} is out of range. Valid values are within 0.0 and 1.0, non-inclusive`,
    );
  });

  it("rejects a batch size above 10", () => {
    expect(() => new SequentialMultiplePull(factoryFor(keggGet()).createSinglePull, { batchSize: 11 })).toThrow(
      "Batch size must be an integer from 1 to 10 but 11 was provided",
    );
  });

  it("drops an ID too long for any request and pulls the rest", async () => {
    const ids = compoundIds(40);
    const tooLong = `cpd:${"X".repeat(4000)}`;
    const { transport, multiplePull } = sequential(keggGet());

    const result = await multiplePull.pull([...ids, tooLong], testContext());

    expect(transport.calls).toHaveLength(4);
    expect(transport.calls.some((call) => call.url.includes(tooLong))).toBe(false);
    expect(result.status).toBe("completed");
    expect(result.successfulEntryIds).toEqual(ids);
    expect(result.failedEntryIds).toEqual([tooLong]);
  });

  it("builds every request before sending the first", async () => {
    const { transport, multiplePull } = sequential(keggGet(), { entryField: "image" });

    const result = await multiplePull.pull(["map00010", `map${"0".repeat(4000)}`], testContext());

    expect(transport.calls.map((call) => call.url)).toEqual([
      "https://rest.kegg.jp/get/map00010/image",
    ]);
    expect(result.failedEntryIds).toEqual([`map${"0".repeat(4000)}`]);
  });

  it("starts a new batch when the URL would grow past the length limit", async () => {
    const ids = Array.from({ length: 10 }, (_, index) => `cpd:${"X".repeat(495)}${index}`);
    const { transport, multiplePull } = sequential(keggGet());

    const result = await multiplePull.pull(ids, testContext());

    expect(
      transport.calls.map((call) => call.url.slice("https://rest.kegg.jp/get/".length).split("+").length),
    ).toEqual([7, 3]);
    expect(result.successfulEntryIds).toEqual(ids);
  });

  it("classifies the same IDs identically when pulled twice", async () => {
    const ids = compoundIds(13);
    const exists = (entryId: string) => !["cpd:C00004", "cpd:C00012"].includes(entryId);
    const first = sequential(keggGet(exists), { batchSize: 5 });
    const second = sequential(keggGet(exists), { batchSize: 5 });

    const firstResult = await first.multiplePull.pull(ids, testContext());
    const secondResult = await second.multiplePull.pull(ids, testContext());

    expect(secondResult.successfulEntryIds).toEqual(firstResult.successfulEntryIds);
    expect(secondResult.failedEntryIds).toEqual(["cpd:C00004", "cpd:C00012"]);
    expect(firstResult.failedEntryIds).toEqual(["cpd:C00004", "cpd:C00012"]);
    expect([...second.saver.entries.keys()]).toEqual([...first.saver.entries.keys()]);
  });

  it("rejects empty input before any request", async () => {
    const { transport, multiplePull } = sequential(keggGet());

    await expect(multiplePull.pull(["  "], testContext())).rejects.toMatchObject({
      code: BaseErrorCode.VALIDATION_ERROR,
    });
    expect(transport.calls).toHaveLength(0);
  });
});
