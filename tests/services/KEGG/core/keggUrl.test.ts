import { describe, expect, it } from "vitest";
import {
  createKeggUrl,
  KeggRequest,
} from "../../../../src/services/KEGG/core/keggUrl.js";
import { BaseErrorCode, McpError } from "../../../../src/types-global/errors.js";

const baseUrl = "https://rest.kegg.jp";
const build = (request: KeggRequest): string => createKeggUrl(request, { baseUrl }).url;
const ORG_NOTE = "Where <org> is an organism code or T number.";

describe("createKeggUrl", () => {
  it.each<[KeggRequest, string]>([
    [{ operation: "info", database: "ligand" }, "info/ligand"],
    [{ operation: "list", database: "hsa" }, "list/hsa"],
    [{ operation: "list", database: "T01001" }, "list/T01001"],
    [{ operation: "get", entryIds: ["cpd:C00001", "cpd:C00002"] }, "get/cpd:C00001+cpd:C00002"],
    [{ operation: "get", entryIds: ["hsa:10458"], entryField: "aaseq" }, "get/hsa:10458/aaseq"],
    [{ operation: "find", database: "compound", keywords: ["glucose", "acid"] }, "find/compound/glucose+acid"],
    [
      { operation: "molecular-find", database: "drug", molecularWeight: [300, 310] },
      "find/drug/300-310/mol_weight",
    ],
    [
      { operation: "molecular-find", database: "compound", exactMass: 174.1 },
      "find/compound/174.1/exact_mass",
    ],
    [
      { operation: "database-conv", keggDatabase: "hsa", outsideDatabase: "ncbi-geneid" },
      "conv/hsa/ncbi-geneid",
    ],
    [
      { operation: "entries-conv", targetDatabase: "ncbi-geneid", entryIds: ["hsa:10458", "hsa:10459"] },
      "conv/ncbi-geneid/hsa:10458+hsa:10459",
    ],
    [{ operation: "database-link", targetDatabase: "pathway", sourceDatabase: "hsa" }, "link/pathway/hsa"],
    [
      { operation: "entries-link", targetDatabase: "genes", entryIds: ["K00001"] },
      "link/genes/K00001",
    ],
    [{ operation: "ddi", drugEntryIds: ["dr:D00564", "dr:D00100"] }, "ddi/dr:D00564+dr:D00100"],
  ])("renders %j", (request, path) => {
    expect(build(request)).toBe(`${baseUrl}/${path}`);
  });

  it.each<[KeggRequest, string]>([
    [
      { operation: "list", database: "ligand" },
      'Invalid database name: "ligand". Valid values are: <org>, ag, atc, brite, brite_ja, compound, compound_ja, ' +
        "dgroup, dgroup_ja, disease, disease_ja, drug, drug_ja, enzyme, genome, glycan, jtc, ko, module, ndc, network, " +
        `organism, pathway, rclass, reaction, variant, vg, vp, yj. ${ORG_NOTE}`,
    ],
    [
      { operation: "info", database: "organism" },
      'Invalid database name: "organism". Valid values are: <org>, ag, brite, compound, dgroup, disease, drug, ' +
        "enzyme, genes, genome, glycan, kegg, ko, ligand, module, network, pathway, rclass, reaction, variant, vg, vp." +
        ` ${ORG_NOTE}`,
    ],
    [{ operation: "get", entryIds: [] }, "Entry IDs must be specified for the KEGG get operation"],
    [
      { operation: "get", entryIds: ["x"], entryField: "invalid-entry-field" },
      'Invalid KEGG entry field: "invalid-entry-field". Valid values are: aaseq, conf, image, json, kcf, kgml, mol, ntseq.',
    ],
    [
      { operation: "get", entryIds: ["x", "y"], entryField: "json" },
      'The KEGG entry field: "json" only supports requests of one KEGG entry at a time but 2 entry IDs are provided',
    ],
    [
      { operation: "get", entryIds: ["1", "2", "3", "4", "5", "6", "7", "8", "9", "10", "11"] },
      "The maximum number of entry IDs is 10 but 11 were provided",
    ],
    [{ operation: "find", database: "not-brite", keywords: [] }, "No search keywords specified"],
    [
      { operation: "find", database: "brite", keywords: ["x"] },
      'Invalid database name: "brite". Valid values are: <org>, ag, atc, brite_ja, compound, compound_ja, dgroup, ' +
        "dgroup_ja, disease, disease_ja, drug, drug_ja, enzyme, genes, genome, glycan, jtc, ko, ligand, module, ndc, " +
        `network, pathway, rclass, reaction, variant, vg, vp, yj. ${ORG_NOTE}`,
    ],
    [
      { operation: "molecular-find", database: "glycan" },
      'Invalid molecular database name: "glycan". Valid values are: compound, drug.',
    ],
    [
      { operation: "molecular-find", database: "drug" },
      "Must provide either a chemical formula, exact mass, or molecular weight option",
    ],
    [
      { operation: "molecular-find", database: "compound", exactMass: [1.1, 2.2, 3.3] },
      "Exact mass range can only be constructed from 2 values but 3 are provided: 1.1, 2.2, 3.3",
    ],
    [
      { operation: "molecular-find", database: "compound", molecularWeight: [] },
      "Molecular weight range can only be constructed from 2 values but 0 are provided: ",
    ],
    [
      { operation: "molecular-find", database: "drug", exactMass: [30.3, 20.2] },
      "The first value in the range must be less than the second. Values provided: 30.3-20.2",
    ],
    [
      { operation: "molecular-find", database: "drug", molecularWeight: [101, 101] },
      "The first value in the range must be less than the second. Values provided: 101-101",
    ],
    [
      { operation: "database-conv", keggDatabase: "genes", outsideDatabase: "" },
      `Invalid KEGG database: "genes". Valid values are: <org>, compound, drug, glycan. ${ORG_NOTE}`,
    ],
    [
      { operation: "database-conv", keggDatabase: "drug", outsideDatabase: "glycan" },
      'Invalid outside database: "glycan". Valid values are: chebi, ncbi-geneid, ncbi-proteinid, pubchem, uniprot.',
    ],
    [
      { operation: "database-conv", keggDatabase: "hsa", outsideDatabase: "pubchem" },
      'KEGG database "hsa" is a gene database but outside database "pubchem" is not.',
    ],
    [
      { operation: "database-conv", keggDatabase: "compound", outsideDatabase: "ncbi-geneid" },
      'KEGG database "compound" is a molecule database but outside database "ncbi-geneid" is not.',
    ],
    [
      { operation: "entries-conv", targetDatabase: "rclass", entryIds: [] },
      'Invalid target database: "rclass". Valid values are: <org>, chebi, compound, drug, genes, glycan, ncbi-geneid,' +
        ` ncbi-proteinid, pubchem, uniprot. ${ORG_NOTE}`,
    ],
    [
      { operation: "entries-conv", targetDatabase: "chebi", entryIds: [] },
      'Entry IDs must be specified for this KEGG "conv" operation',
    ],
    [
      { operation: "database-link", targetDatabase: "ndc", sourceDatabase: "kegg" },
      'Invalid database name: "kegg". Valid values are: <org>, ag, atc, brite, compound, dgroup, disease, drug, ' +
        "enzyme, genome, glycan, jtc, ko, module, ndc, network, pathway, pubmed, rclass, reaction, variant, vg, vp, yj." +
        ` ${ORG_NOTE}`,
    ],
    [
      { operation: "database-link", targetDatabase: "drug", sourceDatabase: "drug" },
      "The source and target database cannot be identical. Database selected: drug.",
    ],
    [
      { operation: "entries-link", targetDatabase: "yj", entryIds: [] },
      "At least one entry ID must be specified to perform the link operation",
    ],
    [
      { operation: "ddi", drugEntryIds: [] },
      "At least one drug entry ID must be specified for the DDI operation",
    ],
  ])("rejects %j", (request, reason) => {
    expect(() => build(request)).toThrow(`Cannot create URL - ${reason}`);
  });

  it("rejects URLs longer than 4000 characters", () => {
    const request: KeggRequest = {
      operation: "find",
      database: "ko",
      keywords: Array.from({ length: 500 }, () => "keyword"),
    };
    expect(() => build(request)).toThrow(
      "Cannot create URL - The KEGG URL length of 4028 exceeds the limit of 4000",
    );
  });

  it("raises INVALID_URL errors", () => {
    try {
      build({ operation: "ddi", drugEntryIds: [] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(McpError);
      expect(error instanceof McpError && error.code).toBe(BaseErrorCode.INVALID_URL);
    }
  });

  it("prefers the formula, then the exact mass, when several attributes are given", () => {
    expect(
      build({ operation: "molecular-find", database: "compound", formula: "O3", exactMass: 20.2 }),
    ).toBe(`${baseUrl}/find/compound/O3/formula`);
    expect(
      build({ operation: "molecular-find", database: "compound", exactMass: 20.2, molecularWeight: 200 }),
    ).toBe(`${baseUrl}/find/compound/20.2/exact_mass`);
  });
});
