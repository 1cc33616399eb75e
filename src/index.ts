/**
 * @fileoverview Public API of the kegg-pull library.
 * @module src/index
 */

export {
  KEGG_ENTRY_FIELD_LIST,
  MAX_ENTRY_IDS_PER_REQUEST,
  type KeggEntryField,
} from "./services/KEGG/core/keggConstants.js";
export {
  KeggCoreApiClient,
  type KeggTransport,
  type TransportResult,
} from "./services/KEGG/core/keggCoreApiClient.js";
export {
  KeggRequester,
  type KeggResponse,
  type RequestPolicy,
} from "./services/KEGG/core/keggRequester.js";
export { KeggRestService } from "./services/KEGG/core/keggRestService.js";
export {
  createKeggUrl,
  type KeggRequest,
  type KeggUrl,
  type MolecularAttributes,
} from "./services/KEGG/core/keggUrl.js";
export { EntryIdsGetter } from "./services/KEGG/entryIds.js";
export {
  combineMappings,
  LinkToDict,
  mappingToJson,
  reverseMapping,
  type DatabaseLinkOptions,
  type KeggMapping,
} from "./services/KEGG/linkToDict.js";
export {
  PathwayOrganizer,
  type HierarchyNode,
  type HierarchyNodes,
} from "./services/KEGG/pathwayOrganizer.js";
export { BatchRequester } from "./services/KEGG/pull/batchRequester.js";
export {
  DirectoryEntrySaver,
  EntrySaver,
  MemoryEntrySaver,
  ZipEntrySaver,
} from "./services/KEGG/pull/entrySavers.js";
export { splitEntries } from "./services/KEGG/pull/entrySplitter.js";
export {
  SequentialMultiplePull,
  type PullProgress,
  type UnsuccessfulThreshold,
} from "./services/KEGG/pull/multiplePull.js";
export { ParallelMultiplePull } from "./services/KEGG/pull/parallelMultiplePull.js";
export {
  pull,
  pullToMemory,
  type MemoryPullOutcome,
  type PullOptions,
} from "./services/KEGG/pull/pull.js";
export { PullResult, type PullStatus } from "./services/KEGG/pull/pullResult.js";
export {
  summarizePullResult,
  writePullSummary,
  type PullSummary,
} from "./services/KEGG/pull/pullSummary.js";
export { SinglePull } from "./services/KEGG/pull/singlePull.js";
export { BaseErrorCode, McpError } from "./types-global/errors.js";
