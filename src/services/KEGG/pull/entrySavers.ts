/**
 * @fileoverview Destinations for pulled entries: a directory of files, a ZIP
 * archive, or an in-memory map. Each entry is stored as
 * `<entryId>.<entryField or "txt">`.
 * @module src/services/KEGG/pull/entrySavers
 */

import AdmZip from "adm-zip";
import { existsSync } from "fs";
import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { BaseErrorCode } from "../../../types-global/errors.js";
import { ErrorHandler, RequestContext } from "../../../utils/index.js";
import { KeggEntryField } from "../core/keggConstants.js";

export type EntryContent = string | Buffer;

export const entryFileName = (entryId: string, entryField?: KeggEntryField): string =>
  `${entryId}.${entryField ?? "txt"}`;

export abstract class EntrySaver {
  /** Prepares the destination once, before any entry is pulled. */
  public async open(context: RequestContext): Promise<void> {
    await ErrorHandler.tryCatch(() => this.prepare(), {
      operation: `${this.constructor.name}.open`,
      context,
      errorCode: BaseErrorCode.STORAGE_ERROR,
    });
  }

  public async save(
    entryId: string,
    entry: EntryContent,
    entryField: KeggEntryField | undefined,
    context: RequestContext,
  ): Promise<void> {
    await ErrorHandler.tryCatch(
      () => this.store(entryId, entryFileName(entryId, entryField), entry),
      {
        operation: `${this.constructor.name}.save`,
        context,
        input: { entryId, entryField },
        errorCode: BaseErrorCode.STORAGE_ERROR,
      },
    );
  }

  /** Called once when the run ends, whether or not it succeeded. */
  public async close(context: RequestContext): Promise<void> {
    await ErrorHandler.tryCatch(() => this.flush(), {
      operation: `${this.constructor.name}.close`,
      context,
      errorCode: BaseErrorCode.STORAGE_ERROR,
    });
  }

  protected abstract store(
    entryId: string,
    fileName: string,
    entry: EntryContent,
  ): Promise<void>;

  protected async prepare(): Promise<void> {}

  protected async flush(): Promise<void> {}
}

export class DirectoryEntrySaver extends EntrySaver {
  private created: Promise<unknown> | undefined;

  constructor(public readonly outputDir: string) {
    super();
  }

  protected async store(_entryId: string, fileName: string, entry: EntryContent): Promise<void> {
    this.created ??= mkdir(this.outputDir, { recursive: true });
    await this.created;
    await writeFile(path.join(this.outputDir, fileName), entry);
  }
}

/**
 * Adds entries to an archive (an existing one is opened, not replaced). The
 * archive is read on first use and written back once, on `close`.
 */
export class ZipEntrySaver extends EntrySaver {
  private zip: AdmZip | undefined;
  private pending = false;

  constructor(public readonly zipFile: string) {
    super();
  }

  protected async prepare(): Promise<void> {
    this.archive();
  }

  protected async store(_entryId: string, fileName: string, entry: EntryContent): Promise<void> {
    this.archive().addFile(
      fileName,
      typeof entry === "string" ? Buffer.from(entry, "utf-8") : entry,
    );
    this.pending = true;
  }

  protected async flush(): Promise<void> {
    if (!this.pending) return;
    await mkdir(path.dirname(path.resolve(this.zipFile)), { recursive: true });
    await writeFile(this.zipFile, this.archive().toBuffer());
    this.pending = false;
  }

  private archive(): AdmZip {
    this.zip ??= existsSync(this.zipFile) ? new AdmZip(this.zipFile) : new AdmZip();
    return this.zip;
  }
}

export class MemoryEntrySaver extends EntrySaver {
  public readonly entries = new Map<string, EntryContent>();

  protected async store(entryId: string, _fileName: string, entry: EntryContent): Promise<void> {
    this.entries.set(entryId, entry);
  }
}

/** A ZIP saver for paths ending in `.zip`, a directory saver otherwise. */
export function createEntrySaver(output: string): EntrySaver {
  return output.endsWith(".zip") ? new ZipEntrySaver(output) : new DirectoryEntrySaver(output);
}
