/**
 * @fileoverview Builds and validates KEGG REST API URLs. Every operation is
 * described by a `KeggRequest` value; `createKeggUrl` checks it against the
 * rules KEGG enforces and renders `<base>/<operation>/<options>`.
 * @module src/services/KEGG/core/keggUrl
 */

import { config } from "../../../config/index.js";
import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import {
  logger,
  RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import {
  isOrganism,
  KEGG_DATABASES,
  KEGG_ENTRY_FIELD_NAMES,
  KeggDatabaseGroup,
  KeggEntryField,
  isKeggEntryField,
  MAX_ENTRY_IDS_PER_REQUEST,
  MAX_URL_LENGTH,
  onlyOneEntryPerRequest,
  ORGANISM_PLACEHOLDER,
} from "./keggConstants.js";

/** A single value, or a two-value range, for molecular searches. */
export type MolecularQuery = number | readonly number[];

export interface MolecularAttributes {
  formula?: string;
  exactMass?: MolecularQuery;
  molecularWeight?: MolecularQuery;
}

export type KeggRequest =
  | { operation: "info"; database: string }
  | { operation: "list"; database: string }
  | {
      operation: "get";
      entryIds: readonly string[];
      entryField?: KeggEntryField | string;
    }
  | { operation: "find"; database: string; keywords: readonly string[] }
  | ({ operation: "molecular-find"; database: string } & MolecularAttributes)
  | { operation: "database-conv"; keggDatabase: string; outsideDatabase: string }
  | {
      operation: "entries-conv";
      targetDatabase: string;
      entryIds: readonly string[];
    }
  | { operation: "database-link"; targetDatabase: string; sourceDatabase: string }
  | {
      operation: "entries-link";
      targetDatabase: string;
      entryIds: readonly string[];
    }
  | { operation: "ddi"; drugEntryIds: readonly string[] };

export type KeggOperation = KeggRequest["operation"];

/** A validated request together with its rendered URL. */
export interface KeggUrl {
  readonly request: KeggRequest;
  readonly url: string;
}

export interface CreateKeggUrlOptions {
  /** Defaults to `config.kegg.baseUrl`. */
  baseUrl?: string;
  context?: RequestContext;
}

const KNOWN_DATABASES: ReadonlySet<string> = new Set(
  Object.values(KEGG_DATABASES).flatMap((names) => [...names]),
);

const invalidUrl = (reason: string, request: KeggRequest): McpError =>
  new McpError(BaseErrorCode.INVALID_URL, `Cannot create URL - ${reason}`, {
    operation: request.operation,
  });

/**
 * Accepts organism codes only when they do not collide with a named KEGG
 * database (e.g. "kegg" is a database, not an organism).
 */
const acceptsAsOrganism = (database: string): boolean =>
  isOrganism(database) && !KNOWN_DATABASES.has(database);

function validateOption(
  request: KeggRequest,
  optionName: string,
  value: string,
  group: KeggDatabaseGroup,
  allowOrganism: boolean,
): void {
  if (KEGG_DATABASES[group].has(value)) return;
  if (allowOrganism && acceptsAsOrganism(value)) return;

  const names = [...KEGG_DATABASES[group]].sort();
  const validValues = allowOrganism ? [ORGANISM_PLACEHOLDER, ...names] : names;
  let reason = `Invalid ${optionName}: "${value}". Valid values are: ${validValues.join(", ")}.`;
  if (allowOrganism) {
    reason += ` Where ${ORGANISM_PLACEHOLDER} is an organism code or T number.`;
  }
  throw invalidUrl(reason, request);
}

function getOptions(request: Extract<KeggRequest, { operation: "get" }>): string {
  const { entryIds, entryField } = request;
  if (entryIds.length === 0) {
    throw invalidUrl("Entry IDs must be specified for the KEGG get operation", request);
  }
  if (entryIds.length > MAX_ENTRY_IDS_PER_REQUEST) {
    throw invalidUrl(
      `The maximum number of entry IDs is ${MAX_ENTRY_IDS_PER_REQUEST} but ${entryIds.length} were provided`,
      request,
    );
  }
  const joined = entryIds.join("+");
  if (entryField === undefined) return joined;

  if (!isKeggEntryField(entryField)) {
    throw invalidUrl(
      `Invalid KEGG entry field: "${entryField}". Valid values are: ${KEGG_ENTRY_FIELD_NAMES.join(", ")}.`,
      request,
    );
  }
  if (onlyOneEntryPerRequest(entryField) && entryIds.length > 1) {
    throw invalidUrl(
      `The KEGG entry field: "${entryField}" only supports requests of one KEGG entry at a time but ${entryIds.length} entry IDs are provided`,
      request,
    );
  }
  return `${joined}/${entryField}`;
}

function molecularValue(
  request: KeggRequest,
  label: string,
  query: MolecularQuery,
): string {
  if (typeof query === "number") return String(query);
  if (query.length !== 2) {
    throw invalidUrl(
      `${label} range can only be constructed from 2 values but ${query.length} are provided: ${query.join(", ")}`,
      request,
    );
  }
  const [min, max] = query;
  if (min >= max) {
    throw invalidUrl(
      `The first value in the range must be less than the second. Values provided: ${min}-${max}`,
      request,
    );
  }
  return `${min}-${max}`;
}

function molecularFindOptions(
  request: Extract<KeggRequest, { operation: "molecular-find" }>,
  context: RequestContext,
): string {
  const { database, formula, exactMass, molecularWeight } = request;
  validateOption(request, "molecular database name", database, "molecularFind", false);

  if (formula !== undefined) {
    if (exactMass !== undefined || molecularWeight !== undefined) {
      logger.warning(
        "Only a chemical formula, exact mass, or molecular weight is used to construct the URL. Using formula...",
        context,
      );
    }
    return `${database}/${formula}/formula`;
  }
  if (exactMass !== undefined) {
    if (molecularWeight !== undefined) {
      logger.warning(
        "Both an exact mass and molecular weight are provided. Using exact mass...",
        context,
      );
    }
    return `${database}/${molecularValue(request, "Exact mass", exactMass)}/exact_mass`;
  }
  if (molecularWeight !== undefined) {
    return `${database}/${molecularValue(request, "Molecular weight", molecularWeight)}/mol_weight`;
  }
  throw invalidUrl(
    "Must provide either a chemical formula, exact mass, or molecular weight option",
    request,
  );
}

function databaseConvOptions(
  request: Extract<KeggRequest, { operation: "database-conv" }>,
): string {
  const { keggDatabase, outsideDatabase } = request;
  validateOption(request, "KEGG database", keggDatabase, "convKegg", true);
  validateOption(request, "outside database", outsideDatabase, "convOutside", false);

  const keggIsGene = !KEGG_DATABASES.convKegg.has(keggDatabase);
  const outsideIsGene = KEGG_DATABASES.convGeneOutside.has(outsideDatabase);
  if (keggIsGene !== outsideIsGene) {
    const kind = keggIsGene ? "gene" : "molecule";
    throw invalidUrl(
      `KEGG database "${keggDatabase}" is a ${kind} database but outside database "${outsideDatabase}" is not.`,
      request,
    );
  }
  return `${keggDatabase}/${outsideDatabase}`;
}

function renderOptions(request: KeggRequest, context: RequestContext): string {
  switch (request.operation) {
    case "info":
      validateOption(request, "database name", request.database, "info", true);
      return request.database;
    case "list":
      validateOption(request, "database name", request.database, "list", true);
      return request.database;
    case "get":
      return getOptions(request);
    case "find":
      if (request.keywords.length === 0) {
        throw invalidUrl("No search keywords specified", request);
      }
      validateOption(request, "database name", request.database, "find", true);
      return `${request.database}/${request.keywords.join("+")}`;
    case "molecular-find":
      return molecularFindOptions(request, context);
    case "database-conv":
      return databaseConvOptions(request);
    case "entries-conv":
      validateOption(request, "target database", request.targetDatabase, "convEntriesTarget", true);
      if (request.entryIds.length === 0) {
        throw invalidUrl('Entry IDs must be specified for this KEGG "conv" operation', request);
      }
      return `${request.targetDatabase}/${request.entryIds.join("+")}`;
    case "database-link":
      validateOption(request, "database name", request.targetDatabase, "link", true);
      validateOption(request, "database name", request.sourceDatabase, "link", true);
      if (request.targetDatabase === request.sourceDatabase) {
        throw invalidUrl(
          `The source and target database cannot be identical. Database selected: ${request.sourceDatabase}.`,
          request,
        );
      }
      return `${request.targetDatabase}/${request.sourceDatabase}`;
    case "entries-link":
      validateOption(request, "database name", request.targetDatabase, "linkEntriesTarget", true);
      if (request.entryIds.length === 0) {
        throw invalidUrl(
          "At least one entry ID must be specified to perform the link operation",
          request,
        );
      }
      return `${request.targetDatabase}/${request.entryIds.join("+")}`;
    case "ddi":
      if (request.drugEntryIds.length === 0) {
        throw invalidUrl(
          "At least one drug entry ID must be specified for the DDI operation",
          request,
        );
      }
      return request.drugEntryIds.join("+");
  }
}

/** Path segment KEGG uses for each operation. */
const OPERATION_PATHS: Record<KeggOperation, string> = {
  info: "info",
  list: "list",
  get: "get",
  find: "find",
  "molecular-find": "find",
  "database-conv": "conv",
  "entries-conv": "conv",
  "database-link": "link",
  "entries-link": "link",
  ddi: "ddi",
};

/**
 * Validates `request` and renders its URL.
 * @throws {McpError} `INVALID_URL` when KEGG would reject the request.
 */
export function createKeggUrl(
  request: KeggRequest,
  options: CreateKeggUrlOptions = {},
): KeggUrl {
  const context =
    options.context ??
    requestContextService.createRequestContext({ operation: "createKeggUrl" });
  const baseUrl = options.baseUrl ?? config.kegg.baseUrl;
  const url = `${baseUrl}/${OPERATION_PATHS[request.operation]}/${renderOptions(request, context)}`;

  if (url.length > MAX_URL_LENGTH) {
    throw invalidUrl(
      `The KEGG URL length of ${url.length} exceeds the limit of ${MAX_URL_LENGTH}`,
      request,
    );
  }
  return { request, url };
}
