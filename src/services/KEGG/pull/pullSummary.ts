/**
 * @fileoverview The JSON summary written after a pull run. A completed run
 * reports totals and the success percentage; an aborted run reports the
 * entry IDs that were never attempted instead.
 * @module src/services/KEGG/pull/pullSummary
 */

import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import { ErrorHandler, RequestContext, requestContextService } from "../../../utils/index.js";
import { PullResult } from "./pullResult.js";

export interface CompletedPullSummary {
  "percent-success": number;
  "pull-minutes": number;
  "num-successful": number;
  "num-failed": number;
  "num-timed-out": number;
  "num-total": number;
  "successful-entry-ids": string[];
  "failed-entry-ids": string[];
  "timed-out-entry-ids": string[];
}

export interface AbortedPullSummary {
  "pull-minutes": number;
  "num-remaining-entry-ids": number;
  "num-successful": number;
  "num-failed": number;
  "num-timed-out": number;
  "remaining-entry-ids": string[];
  "successful-entry-ids": string[];
  "failed-entry-ids": string[];
  "timed-out-entry-ids": string[];
}

export type PullSummary = CompletedPullSummary | AbortedPullSummary;

const roundTwo = (value: number): number => Math.round(value * 100) / 100;

export function summarizePullResult(result: PullResult): PullSummary {
  if (result.elapsedMs === null) {
    throw new McpError(
      BaseErrorCode.INTERNAL_ERROR,
      "Only a finalized pull result can be summarized",
    );
  }
  const pullMinutes = roundTwo(result.elapsedMs / 60_000);
  const successful = [...result.successfulEntryIds];
  const failed = [...result.failedEntryIds];
  const timedOut = [...result.timedOutEntryIds];

  if (result.status === "aborted") {
    return {
      "pull-minutes": pullMinutes,
      "num-remaining-entry-ids": result.remainingEntryIds.length,
      "num-successful": successful.length,
      "num-failed": failed.length,
      "num-timed-out": timedOut.length,
      "remaining-entry-ids": [...result.remainingEntryIds],
      "successful-entry-ids": successful,
      "failed-entry-ids": failed,
      "timed-out-entry-ids": timedOut,
    };
  }

  const total = successful.length + failed.length + timedOut.length;
  return {
    "percent-success": total === 0 ? 0 : roundTwo((successful.length / total) * 100),
    "pull-minutes": pullMinutes,
    "num-successful": successful.length,
    "num-failed": failed.length,
    "num-timed-out": timedOut.length,
    "num-total": total,
    "successful-entry-ids": successful,
    "failed-entry-ids": failed,
    "timed-out-entry-ids": timedOut,
  };
}

/** Writes the summary of `result` as pretty-printed JSON. */
export async function writePullSummary(
  result: PullResult,
  filePath: string,
  context: RequestContext = requestContextService.createRequestContext({
    operation: "writePullSummary",
  }),
): Promise<PullSummary> {
  const summary = summarizePullResult(result);
  await ErrorHandler.tryCatch(
    async () => {
      await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
      await writeFile(filePath, `${JSON.stringify(summary, null, 2)}\n`, "utf-8");
    },
    {
      operation: "writePullSummary",
      context,
      input: { filePath },
      errorCode: BaseErrorCode.STORAGE_ERROR,
    },
  );
  return summary;
}
