/**
 * @fileoverview Splits a multi-entry `get` response into per-ID entries.
 * @module src/services/KEGG/pull/entrySplitter
 */

import { KeggEntryField } from "../core/keggConstants.js";

export interface SplitEntry {
  entryId: string;
  entry: string;
}

export interface SplitResult {
  entries: SplitEntry[];
  /** Requested IDs with no matching segment in the body. */
  missing: string[];
  /** Segments that could not be attributed to any requested ID. */
  unattributed: number;
}

type Separator = (body: string) => string[];

const splitDroppingLast =
  (delimiter: string): Separator =>
  (body) => {
    const segments = body.split(delimiter);
    return segments.length > 1 ? segments.slice(0, -1) : segments;
  };

/** FASTA bodies start with the delimiter, so the leading segment is empty. */
const splitDroppingFirst =
  (delimiter: string): Separator =>
  (body) => {
    const segments = body.split(delimiter);
    return segments.length > 1 ? segments.slice(1) : segments;
  };

const standardSeparator = splitDroppingLast("///");

const SEPARATORS: Partial<Record<KeggEntryField, Separator>> = {
  kcf: standardSeparator,
  mol: splitDroppingLast("$$$$"),
  aaseq: splitDroppingFirst(">"),
  ntseq: splitDroppingFirst(">"),
};

/** Segments of `body`, trimmed, blanks removed. */
export function separateEntries(body: string, entryField?: KeggEntryField): string[] {
  const separator =
    entryField === undefined ? standardSeparator : (SEPARATORS[entryField] ?? standardSeparator);
  return separator(body)
    .map((segment) => segment.trim())
    .filter((segment) => segment !== "");
}

/** `cpd:C00001` -> `C00001`; IDs without a prefix are returned unchanged. */
const accessionOf = (entryId: string): string => {
  const colon = entryId.indexOf(":");
  return colon === -1 ? entryId : entryId.slice(colon + 1);
};

const firstLineTokens = (segment: string): Set<string> => {
  const firstLine = segment.split("\n", 1)[0];
  return new Set(firstLine.split(/\s+/).filter((token) => token !== ""));
};

/**
 * Maps the segments of `body` to the IDs of `batch`. When the segment count
 * equals the batch length they are paired in order. Otherwise each segment is
 * attributed to the ID whose full form or accession appears in its first
 * line; IDs left without a segment are reported as missing. A `mol` record
 * carries no ID in that line, so its segments end up unattributed.
 */
export function splitEntries(
  body: string,
  batch: readonly string[],
  entryField?: KeggEntryField,
): SplitResult {
  const segments = separateEntries(body, entryField);

  if (segments.length === batch.length) {
    return {
      entries: batch.map((entryId, index) => ({ entryId, entry: segments[index] })),
      missing: [],
      unattributed: 0,
    };
  }

  const unmatched = new Set(batch);
  const entries: SplitEntry[] = [];
  for (const segment of segments) {
    const tokens = firstLineTokens(segment);
    const entryId = batch.find(
      (candidate) =>
        unmatched.has(candidate) &&
        (tokens.has(candidate) || tokens.has(accessionOf(candidate))),
    );
    if (entryId !== undefined) {
      unmatched.delete(entryId);
      entries.push({ entryId, entry: segment });
    }
  }

  return {
    entries,
    missing: batch.filter((entryId) => unmatched.has(entryId)),
    unattributed: segments.length - entries.length,
  };
}
