import { describe, expect, it } from "vitest";
import {
  KeggGetEntryIdsInputSchema,
  keggGetEntryIdsLogic,
} from "../../../src/mcp-server/tools/keggGetEntryIds/logic.js";
import { BaseErrorCode } from "../../../src/types-global/errors.js";
import { FakeKeggTransport, success, testContext } from "../../helpers/fakeKegg.js";

const LISTING = "cpd:C00001\tH2O\ncpd:C00002\tATP\ncpd:C00003\tNAD+\n";

describe("keggGetEntryIdsLogic", () => {
  it("lists a database and caps the returned IDs", async () => {
    const transport = new FakeKeggTransport(() => success(LISTING));
    const input = KeggGetEntryIdsInputSchema.parse({
      source: "database",
      database: "compound",
      maxResults: 2,
    });

    expect(await keggGetEntryIdsLogic(input, testContext(), { transport })).toEqual({
      source: "database",
      database: "compound",
      totalCount: 3,
      returnedCount: 2,
      entryIds: ["cpd:C00001", "cpd:C00002"],
    });
    expect(transport.calls[0]?.url).toBe("https://rest.kegg.jp/list/compound");
  });

  it("passes a single molecular value and a range through", async () => {
    const transport = new FakeKeggTransport(() => success(LISTING));

    await keggGetEntryIdsLogic(
      KeggGetEntryIdsInputSchema.parse({
        source: "molecular-attribute",
        database: "compound",
        exactMass: [18.01],
      }),
      testContext(),
      { transport },
    );
    await keggGetEntryIdsLogic(
      KeggGetEntryIdsInputSchema.parse({
        source: "molecular-attribute",
        database: "drug",
        molecularWeight: [300, 310],
      }),
      testContext(),
      { transport },
    );

    expect(transport.calls.map((call) => call.url)).toEqual([
      "https://rest.kegg.jp/find/compound/18.01/exact_mass",
      "https://rest.kegg.jp/find/drug/300-310/mol_weight",
    ]);
  });

  it("requires keywords for a keyword search", async () => {
    const transport = new FakeKeggTransport(() => success(LISTING));
    const input = KeggGetEntryIdsInputSchema.parse({ source: "keywords", database: "compound" });

    await expect(keggGetEntryIdsLogic(input, testContext(), { transport })).rejects.toMatchObject({
      code: BaseErrorCode.VALIDATION_ERROR,
    });
    expect(transport.calls).toHaveLength(0);
  });
});
