import { once } from 'node:events';
import fs from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';
import archiver from 'archiver';
import pLimit from 'p-limit';
import { WriteError } from '../common/errors';

export const SYMBOL_DIR = 'symbol';
export const SEMANTICDB_DIR = 'semanticdb';
export const WORKSPACE_FILE = 'index.workspace';
export const ARCHIVE_FILE = 'xrefsite.zip';

/** Where a build writes its site. Paths passed to `write` use `/` separators. */
export interface SiteTarget {
  /** Path reported to the user once the site is complete. */
  readonly location: string;
  prepare(): Promise<void>;
  write(relativePath: string, bytes: Uint8Array): Promise<void>;
  close(): Promise<void>;
  abort(): Promise<void>;
}

export function createSiteTarget(directory: string, zip: boolean): SiteTarget {
  return zip ? new ZipTarget(directory) : new DirectoryTarget(directory);
}

/**
 * Writes each record as its own file. A record lands under a temporary name
 * first and is renamed into place, so readers never see a partial file.
 */
export class DirectoryTarget implements SiteTarget {
  private tempCounter = 0;

  constructor(readonly location: string) {}

  async prepare(): Promise<void> {
    try {
      await fs.promises.mkdir(this.location, { recursive: true });
      // Full rebuild: records from a previous run must not survive.
      for (const dir of [SYMBOL_DIR, SEMANTICDB_DIR]) {
        await fs.promises.rm(path.join(this.location, dir), { recursive: true, force: true });
      }
    } catch (error) {
      throw new WriteError(this.location, error);
    }
  }

  async write(relativePath: string, bytes: Uint8Array): Promise<void> {
    const out = resolveInside(this.location, relativePath);
    this.tempCounter += 1;
    const temp = `${out}.${process.pid}.${this.tempCounter}.tmp`;

    try {
      await fs.promises.mkdir(path.dirname(out), { recursive: true });
      await fs.promises.writeFile(temp, bytes);
      await fs.promises.rename(temp, out);
    } catch (error) {
      await fs.promises.rm(temp, { force: true });
      throw new WriteError(out, error);
    }
  }

  async close(): Promise<void> {
    // Every write is already durable.
  }

  async abort(): Promise<void> {
    // Completed records stay; the next run starts from scratch.
  }
}

/**
 * Streams the whole site into one zip archive. The archive is staged under a
 * temporary name and only renamed to `xrefsite.zip` by `close`. Entries are
 * appended one at a time and a write resolves once archiver has consumed its
 * entry, so callers bound how much data waits in memory.
 */
export class ZipTarget implements SiteTarget {
  readonly location: string;
  private readonly tempPath: string;
  private archive: archiver.Archiver | null = null;
  private output: fs.WriteStream | null = null;
  private flushed: Promise<void> | null = null;
  private failure: unknown = null;
  private readonly appendQueue = pLimit(1);

  constructor(directory: string) {
    this.location = path.join(directory, ARCHIVE_FILE);
    this.tempPath = `${this.location}.${process.pid}.tmp`;
  }

  async prepare(): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(this.location), { recursive: true });
    } catch (error) {
      throw new WriteError(this.location, error);
    }

    const output = fs.createWriteStream(this.tempPath);
    try {
      await once(output, 'open');
    } catch (error) {
      throw new WriteError(this.tempPath, error);
    }

    const archive = archiver('zip', { zlib: { level: 1 } });
    archive.on('error', (error) => {
      this.failure ??= error;
    });
    archive.pipe(output);
    this.flushed = finished(output).catch((error: unknown) => {
      this.failure ??= error;
    });
    this.archive = archive;
    this.output = output;
  }

  write(relativePath: string, bytes: Uint8Array): Promise<void> {
    return this.appendQueue(async () => {
      const archive = this.requireArchive();
      this.throwIfFailed();
      const name = toEntryName(relativePath);
      if (name === '..' || name.startsWith('../')) {
        throw new WriteError(name, new Error(`path escapes archive ${this.location}`));
      }

      const consumed = once(archive, 'entry');
      archive.append(Buffer.from(bytes), { name });
      try {
        await consumed;
      } catch (error) {
        throw new WriteError(this.location, error);
      }
    });
  }

  async close(): Promise<void> {
    const archive = this.requireArchive();
    try {
      await this.appendQueue(() => archive.finalize());
      await this.flushed;
      this.throwIfFailed();
      await fs.promises.rename(this.tempPath, this.location);
    } catch (error) {
      await fs.promises.rm(this.tempPath, { force: true });
      throw error instanceof WriteError ? error : new WriteError(this.location, error);
    } finally {
      this.archive = null;
      this.output = null;
    }
  }

  async abort(): Promise<void> {
    this.archive?.abort();
    this.archive = null;

    const output = this.output;
    this.output = null;
    if (output && !output.closed) {
      const closed = once(output, 'close');
      output.destroy();
      await closed;
    }
    await fs.promises.rm(this.tempPath, { force: true });
  }

  private requireArchive(): archiver.Archiver {
    if (!this.archive) {
      throw new Error('Zip target is not open; call prepare() first');
    }
    return this.archive;
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw new WriteError(this.location, this.failure);
    }
  }
}

function toEntryName(relativePath: string): string {
  return path.posix.normalize(relativePath.replace(/\\/g, '/')).replace(/^\/+/, '');
}

function resolveInside(root: string, relativePath: string): string {
  const resolved = path.resolve(root, toEntryName(relativePath));
  const base = path.resolve(root);
  if (resolved !== base && !resolved.startsWith(base + path.sep)) {
    throw new WriteError(resolved, new Error(`path escapes target directory ${base}`));
  }
  return resolved;
}
