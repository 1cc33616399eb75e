import AdmZip from "adm-zip";
import { readFile } from "fs/promises";
import path from "path";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { CliIo } from "../../src/cli/io.js";
import { runCli, USAGE } from "../../src/cli/runCli.js";
import { config } from "../../src/config/index.js";
import {
  failure,
  FakeHandler,
  FakeKeggTransport,
  flatFileEntry,
  keggGet,
  success,
  withTempDir,
} from "../helpers/fakeKegg.js";
import { PATHWAY_HIERARCHY } from "../helpers/pathwayHierarchy.js";

interface FakeIo extends CliIo {
  transport: FakeKeggTransport;
  output: Array<string | Buffer>;
  errors: string[];
}

const fakeIo = (handler: FakeHandler, stdin = ""): FakeIo => {
  const output: Array<string | Buffer> = [];
  return {
    output,
    errors: [],
    transport: new FakeKeggTransport(handler),
    write: (content) => {
      output.push(content);
    },
    readStdin: async () => stdin,
  };
};

const run = (argv: string[], io: FakeIo): Promise<number | null> =>
  runCli(argv, io, (message) => {
    io.errors.push(message);
  });

/** A multi-entry segment as saved after splitting. */
const splitEntry = (entryId: string): string => flatFileEntry(entryId).slice(0, -"\n///\n".length);

const listThenGet =
  (listBody: string): FakeHandler =>
  (keggUrl, method) =>
    keggUrl.request.operation === "list" ? success(listBody) : keggGet()(keggUrl, method);

describe("runCli", () => {
  it("prints the version", async () => {
    const io = fakeIo(keggGet());

    expect(await run(["--version"], io)).toBe(0);
    expect(io.output).toEqual([`${config.pkg.version}\n`]);
  });

  it("prints usage for an unknown command and exits 1", async () => {
    const io = fakeIo(keggGet());

    expect(await run(["bogus"], io)).toBe(1);
    expect(io.errors).toEqual([`Unknown command "bogus".\n${USAGE}`]);
  });

  it("prints usage when no command is given", async () => {
    const io = fakeIo(keggGet());

    expect(await run([], io)).toBe(1);
    expect(io.errors).toEqual([USAGE]);
  });

  describe("pull", () => {
    it("prints entries headed by their IDs", async () => {
      await withTempDir(async (dir) => {
        const io = fakeIo(keggGet());
        const results = path.join(dir, "results.json");

        const code = await run(
          ["pull", "entry-ids", "cpd:C00001,cpd:C00002", "--print", `--results=${results}`],
          io,
        );

        expect(code).toBe(0);
        expect(io.output).toEqual([
          `cpd:C00001\n${splitEntry("cpd:C00001")}\n`,
          `cpd:C00002\n${splitEntry("cpd:C00002")}\n`,
        ]);
        expect(JSON.parse(await readFile(results, "utf-8"))).toMatchObject({ "num-successful": 2 });
      });
    });

    it("joins printed entries with a separator", async () => {
      await withTempDir(async (dir) => {
        const io = fakeIo(keggGet());

        await run(
          ["pull", "entry-ids", "cpd:C00001,cpd:C00002", "--print", "--sep=----", `--results=${dir}/r.json`],
          io,
        );

        expect(io.output).toEqual([`${splitEntry("cpd:C00001")}\n----\n${splitEntry("cpd:C00002")}\n`]);
      });
    });

    it("reads entry IDs from standard input", async () => {
      await withTempDir(async (dir) => {
        const io = fakeIo(keggGet(), "cpd:C00003\n\ncpd:C00004\n");

        await run(["pull", "entry-ids", "-", "--print", "--sep=|", `--results=${dir}/r.json`], io);

        expect(io.transport.calls.map((call) => call.url)).toEqual([
          "https://rest.kegg.jp/get/cpd:C00003+cpd:C00004",
        ]);
      });
    });

    it("pulls the brite database one entry at a time", async () => {
      await withTempDir(async (dir) => {
        const io = fakeIo(listThenGet("br:br08001\tCompounds\nbr:br08002\tLipids\n"));

        await run(["pull", "database", "brite", "--print", `--results=${dir}/r.json`], io);

        expect(io.transport.calls.map((call) => call.url)).toEqual([
          "https://rest.kegg.jp/list/brite",
          "https://rest.kegg.jp/get/br:br08001",
          "https://rest.kegg.jp/get/br:br08002",
        ]);
        expect(io.output[0]).toBe(`br:br08001\n${flatFileEntry("br:br08001")}\n`);
      });
    });

    it("saves entries to the output directory", async () => {
      await withTempDir(async (dir) => {
        const io = fakeIo(keggGet());
        const output = path.join(dir, "entries");

        await run(
          ["pull", "entry-ids", "hsa:10458", "--entry-field=aaseq", `--output=${output}`, `--results=${dir}/r.json`],
          io,
        );

        expect(await readFile(path.join(output, "hsa:10458.aaseq"), "utf-8")).toBe(flatFileEntry("hsa:10458"));
      });
    });

    it("rejects both threshold options together", async () => {
      const io = fakeIo(keggGet());

      expect(await run(["pull", "entry-ids", "a", "--ut=0.1", "--max-unsuccessful=3"], io)).toBe(1);
      expect(io.errors).toEqual(["Error: Only one of --ut and --max-unsuccessful may be given"]);
      expect(io.transport.calls).toHaveLength(0);
    });

    it("rejects an unknown entry field", async () => {
      const io = fakeIo(keggGet());

      expect(await run(["pull", "entry-ids", "a", "--entry-field=pdf"], io)).toBe(1);
      expect(io.errors[0]).toMatch(/^Error: Invalid value for --entry-field: "pdf" \(/);
    });
  });

  describe("entry-ids", () => {
    it("prints the IDs of a database", async () => {
      const io = fakeIo(() => success("md:M00001\tGlycolysis\nmd:M00002\tGlycolysis core\n"));

      expect(await run(["entry-ids", "database", "module"], io)).toBe(0);
      expect(io.output).toEqual(["md:M00001\nmd:M00002\n"]);
    });

    it("writes keyword search results into a ZIP archive", async () => {
      await withTempDir(async (dir) => {
        const io = fakeIo(() => success("cpd:C00031\tD-Glucose\n"));
        const zipFile = path.join(dir, "ids.zip");

        await run(["entry-ids", "keywords", "compound", "glucose", `--output=${zipFile}:ids.txt`], io);

        expect(io.transport.calls[0]?.url).toBe("https://rest.kegg.jp/find/compound/glucose");
        expect(new AdmZip(zipFile).readAsText("ids.txt")).toBe("cpd:C00031");
      });
    });

    it("rejects a range of more than two values", async () => {
      const io = fakeIo(keggGet());

      const code = await run(
        ["entry-ids", "molecular-attribute", "compound", "--exact-mass=1", "--exact-mass=2", "--exact-mass=3"],
        io,
      );

      expect(code).toBe(1);
      expect(io.errors).toEqual([
        "Error: Range can only be specified by two values but 3 values were provided: 1, 2, 3",
      ]);
    });
  });

  describe("rest", () => {
    it("prints the response body", async () => {
      const io = fakeIo(() => success("hsa:10458\tncbi-geneid:10458"));

      expect(await run(["rest", "conv", "--conv-target=ncbi-geneid", "hsa:10458"], io)).toBe(0);
      expect(io.transport.calls[0]?.url).toBe("https://rest.kegg.jp/conv/ncbi-geneid/hsa:10458");
      expect(io.output).toEqual(["hsa:10458\tncbi-geneid:10458\n"]);
    });

    it("prints images as binary", async () => {
      const png = Buffer.from([0x89, 0x50, 0x4e, 0x47]);
      const io = fakeIo(() => success(png));

      await run(["rest", "get", "map00010", "--entry-field=image"], io);

      expect(io.output).toEqual([png]);
    });

    it("exits 1 when KEGG fails the request", async () => {
      const io = fakeIo(() => failure(404));

      expect(await run(["rest", "get", "cpd:C99999"], io)).toBe(1);
      expect(io.errors).toEqual([
        "Error: The request to the KEGG web API failed with the following URL: https://rest.kegg.jp/get/cpd:C99999",
      ]);
    });

    it("exits 1 for an invalid URL", async () => {
      const io = fakeIo(keggGet());

      expect(await run(["rest", "link", "drug", "drug"], io)).toBe(1);
      expect(io.errors).toEqual([
        "Error: Cannot create URL - The source and target database cannot be identical. Database selected: drug.",
      ]);
    });
  });

  describe("link-to-dict", () => {
    it("prints a deduplicated database mapping", async () => {
      const io = fakeIo(() =>
        success("cpd:C00001\tpath:map00010\ncpd:C00001\tpath:ko00010\n"),
      );

      expect(await run(["link-to-dict", "compound", "pathway", "--deduplicate"], io)).toBe(0);
      expect(io.transport.calls[0]?.url).toBe("https://rest.kegg.jp/link/pathway/compound");
      expect(io.output).toEqual(['{\n  "cpd:C00001": [\n    "path:map00010"\n  ]\n}\n']);
    });

    it("converts entry IDs read from standard input", async () => {
      const io = fakeIo(() => success("hsa:1\tncbi-geneid:1\n"), "hsa:1\n");

      await run(["link-to-dict", "entry-ids", "-", "ncbi-geneid", "--conv", "--reverse"], io);

      expect(io.transport.calls[0]?.url).toBe("https://rest.kegg.jp/conv/ncbi-geneid/hsa:1");
      expect(JSON.parse(String(io.output[0]))).toEqual({ "ncbi-geneid:1": ["hsa:1"] });
    });

    it("rejects a single database", async () => {
      const io = fakeIo(keggGet());

      expect(await run(["link-to-dict", "compound"], io)).toBe(1);
      expect(io.errors[0]).toMatch(/^Error: Invalid arguments for "link-to-dict"\./);
      expect(io.transport.calls).toHaveLength(0);
    });
  });

  describe("pathway-organizer", () => {
    it("reads both node lists from standard input and saves the nodes", async () => {
      await withTempDir(async (dir) => {
        const io = fakeIo(
          () => success(JSON.stringify(PATHWAY_HIERARCHY)),
          "Metabolism\n---\nGlobal and overview maps\n",
        );
        const output = path.join(dir, "nodes.json");

        expect(await run(["pathway-organizer", "--tln=-", "--fn=-", `--output=${output}`], io)).toBe(0);

        const nodes = z.record(z.unknown()).parse(JSON.parse(await readFile(output, "utf-8")));
        expect(Object.keys(nodes)).toEqual([
          "path:map00010",
          "Carbohydrate metabolism",
          "Metabolism",
        ]);
      });
    });

    it("requires a delimiter when both lists come from standard input", async () => {
      const io = fakeIo(() => success(JSON.stringify(PATHWAY_HIERARCHY)), "Metabolism\n");

      expect(await run(["pathway-organizer", "--tln=-", "--fn=-"], io)).toBe(1);
      expect(io.errors).toEqual([
        'Error: When both --tln and --fn are "-", standard input must separate them with a "---" line',
      ]);
      expect(io.transport.calls).toHaveLength(0);
    });
  });
});
