/**
 * @fileoverview Constants and shared type definitions for KEGG REST API
 * interactions: per-request limits, entry fields and the database names each
 * operation accepts.
 * @module src/services/KEGG/core/keggConstants
 */

import { readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import { config } from "../../../config/index.js";

/** Maximum number of entry IDs KEGG accepts in one `get` request. */
export const MAX_ENTRY_IDS_PER_REQUEST = 10;

/** Maximum length of a KEGG REST URL. */
export const MAX_URL_LENGTH = 4000;

/** Entry fields the `get` operation accepts. */
export const KEGG_ENTRY_FIELD_LIST = [
  "aaseq",
  "ntseq",
  "mol",
  "kcf",
  "image",
  "conf",
  "kgml",
  "json",
] as const;

export type KeggEntryField = (typeof KEGG_ENTRY_FIELD_LIST)[number];

/** Whether a `get` request for the field may name more than one entry ID. */
export const KEGG_ENTRY_FIELDS: Record<KeggEntryField, boolean> = {
  aaseq: true,
  ntseq: true,
  mol: true,
  kcf: true,
  image: false,
  conf: false,
  kgml: false,
  json: false,
};

export const KEGG_ENTRY_FIELD_NAMES: readonly string[] = [
  ...KEGG_ENTRY_FIELD_LIST,
].sort();

export const isKeggEntryField = (value: string): value is KeggEntryField =>
  Object.prototype.hasOwnProperty.call(KEGG_ENTRY_FIELDS, value);

/** True when `entryField` restricts a `get` request to a single entry ID. */
export const onlyOneEntryPerRequest = (entryField?: KeggEntryField): boolean =>
  entryField !== undefined && !KEGG_ENTRY_FIELDS[entryField];

/** Entries pulled with this field come back as binary (PNG) bodies. */
export const isBinaryEntryField = (entryField?: KeggEntryField): boolean =>
  entryField === "image";

/**
 * Placeholder shown in error messages for databases that also accept an
 * organism code or T number.
 */
export const ORGANISM_PLACEHOLDER = "<org>";

const ORGANISM_CODE_PATTERN = /^[a-z]{3,4}$/;
const T_NUMBER_PATTERN = /^T\d{5}$/;

/** Organism codes (`hsa`, `eco`) and T numbers (`T01001`). */
export const isOrganism = (database: string): boolean =>
  ORGANISM_CODE_PATTERN.test(database) || T_NUMBER_PATTERN.test(database);

const KeggDatabasesSchema = z.object({
  info: z.array(z.string()),
  list: z.array(z.string()),
  find: z.array(z.string()),
  molecularFind: z.array(z.string()),
  convKegg: z.array(z.string()),
  convOutside: z.array(z.string()),
  convGeneOutside: z.array(z.string()),
  convEntriesTarget: z.array(z.string()),
  link: z.array(z.string()),
  linkEntriesTarget: z.array(z.string()),
});

export type KeggDatabaseGroup = keyof z.infer<typeof KeggDatabasesSchema>;

const loadKeggDatabases = (): Record<KeggDatabaseGroup, ReadonlySet<string>> => {
  const filePath = path.join(config.projectRoot, "data", "keggDatabases.json");
  const parsed = KeggDatabasesSchema.parse(
    JSON.parse(readFileSync(filePath, "utf-8")),
  );
  return {
    info: new Set(parsed.info),
    list: new Set(parsed.list),
    find: new Set(parsed.find),
    molecularFind: new Set(parsed.molecularFind),
    convKegg: new Set(parsed.convKegg),
    convOutside: new Set(parsed.convOutside),
    convGeneOutside: new Set(parsed.convGeneOutside),
    convEntriesTarget: new Set(parsed.convEntriesTarget),
    link: new Set(parsed.link),
    linkEntriesTarget: new Set(parsed.linkEntriesTarget),
  };
};

/** Database names accepted per operation, read from `data/keggDatabases.json`. */
export const KEGG_DATABASES = loadKeggDatabases();
