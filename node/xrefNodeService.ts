import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';
import type { IXrefService } from '../common/xrefService';
import { DecodeError, WriteError, errorMessage, shortStackTrace } from '../common/errors';
import type { BuildResult, SiteSummary, SymbolIndexRecord, XrefConfig } from '../common/types';
import { OccurrenceAccumulator } from './accumulator';
import { IndexWriter, symbolRecordPath } from './indexWriter';
import { runBounded } from './pool';
import { phase, type ProgressObserver } from './progress';
import { reconcile } from './reconciler';
import { scanSemanticdbs } from './scanner';
import { decodeSymbolIndex, decodeWorkspace } from './schema';
import { parseSemanticdbFile } from './semanticdb';
import { createSiteTarget, SYMBOL_DIR, WORKSPACE_FILE, type SiteTarget } from './siteTarget';

export interface ServiceLogger {
  warn(message: string): void;
  debug(message: string): void;
}

export interface XrefServiceOptions {
  progress?: ProgressObserver;
  logger?: ServiceLogger;
}

export const consoleLogger: ServiceLogger = {
  warn: (message) => console.warn(message),
  debug: (message) => {
    if (process.env.DEBUG) {
      console.debug(`[xrefsite] ${message}`);
    }
  },
};

interface IndexedFiles {
  indexedDocuments: number;
  skippedFiles: number;
}

export class XrefNodeService implements IXrefService {
  private config: XrefConfig | null = null;
  private currentBuild: Promise<BuildResult> | null = null;
  private readonly progress: ProgressObserver | undefined;
  private readonly logger: ServiceLogger;

  constructor(options: XrefServiceOptions = {}) {
    this.progress = options.progress;
    this.logger = options.logger ?? consoleLogger;
  }

  async initialize(config: XrefConfig): Promise<void> {
    this.config = { ...config, target: path.resolve(config.target) };
  }

  /**
   * Runs a full rebuild of the site. A call made while a build is running
   * joins that build instead of starting another.
   */
  buildSite(classpath: string[]): Promise<BuildResult> {
    if (this.currentBuild) {
      return this.currentBuild;
    }

    this.currentBuild = this.runBuild(classpath).finally(() => {
      this.currentBuild = null;
    });
    return this.currentBuild;
  }

  async lookupSymbol(symbol: string): Promise<SymbolIndexRecord | null> {
    const bytes = await this.readSiteFile(symbolRecordPath(symbol));
    return bytes ? decodeSymbolIndex(bytes) : null;
  }

  async readWorkspace(): Promise<string[]> {
    const bytes = await this.readSiteFile(WORKSPACE_FILE);
    if (!bytes) {
      throw new Error(`No workspace manifest in ${this.requireConfig().target}. Run \`xrefsite build\` first.`);
    }
    return decodeWorkspace(bytes).filenames;
  }

  async getSiteSummary(): Promise<SiteSummary> {
    const { target } = this.requireConfig();
    const filenames = await this.readWorkspace();
    const entries = await fg('**/*', { cwd: target, onlyFiles: true, stats: true, dot: true });

    let publishedSymbols = 0;
    let siteSize = 0;
    for (const entry of entries) {
      siteSize += entry.stats?.size ?? 0;
      if (entry.path.startsWith(`${SYMBOL_DIR}/`)) {
        publishedSymbols++;
      }
    }

    return { target, totalFiles: filenames.length, publishedSymbols, siteSize };
  }

  dispose(): void {
    this.config = null;
  }

  private async runBuild(classpath: string[]): Promise<BuildResult> {
    const config = this.requireConfig();
    const started = Date.now();

    if (config.cleanTargetFirst) {
      await this.cleanTarget(config.target);
    }

    const target = createSiteTarget(config.target, config.zip);
    await target.prepare();

    try {
      const files = await this.scanPhase(classpath, config.concurrency);
      const accumulator = new OccurrenceAccumulator();
      const writer = new IndexWriter(target, config.concurrency);
      const indexed = await this.buildSymbolIndexPhase(files, accumulator, writer, config.concurrency);

      const snapshot = accumulator.snapshot();
      const published = reconcile(snapshot, { publishTermAliases: config.publishTermAliases });
      await this.writeSymbolIndexPhase(published, writer);
      await writer.writeWorkspace(snapshot.filenames);
      await target.close();

      return {
        target: target.location,
        scannedFiles: files.length,
        indexedDocuments: indexed.indexedDocuments,
        skippedFiles: indexed.skippedFiles,
        symbolCount: snapshot.symbols.size,
        publishedSymbols: published.length,
        filenames: snapshot.filenames.length,
        durationMs: Date.now() - started,
      };
    } catch (error) {
      await this.abortTarget(target);
      throw error;
    }
  }

  private scanPhase(classpath: string[], concurrency: number): Promise<string[]> {
    return phase(this.progress, 'Scanning semanticdb files', classpath.length, (tick) =>
      scanSemanticdbs(classpath, { concurrency, onRoot: tick })
    );
  }

  private buildSymbolIndexPhase(
    files: string[],
    accumulator: OccurrenceAccumulator,
    writer: IndexWriter,
    concurrency: number
  ): Promise<IndexedFiles> {
    return phase(this.progress, 'Building symbol index', files.length, async (tick) => {
      const counts: IndexedFiles = { indexedDocuments: 0, skippedFiles: 0 };

      await runBounded(files, concurrency, async (file, stopped) => {
        try {
          const documents = await parseSemanticdbFile(file);
          for (const document of documents) {
            if (stopped()) {
              return;
            }
            accumulator.accumulate(document);
            await writer.writeDocument(document);
          }
          counts.indexedDocuments += documents.length;
        } catch (error) {
          if (!(error instanceof DecodeError)) {
            throw error;
          }
          counts.skippedFiles++;
          this.logger.warn(`${file}\n${shortStackTrace(error)}`);
        } finally {
          tick();
        }
      });

      return counts;
    });
  }

  private writeSymbolIndexPhase(records: SymbolIndexRecord[], writer: IndexWriter): Promise<number> {
    return phase(this.progress, 'Writing symbol index', records.length, (tick) =>
      writer.writeSymbolIndex(records, tick)
    );
  }

  private async cleanTarget(directory: string): Promise<void> {
    try {
      await fs.promises.rm(directory, { recursive: true, force: true });
    } catch (error) {
      throw new WriteError(directory, error);
    }
  }

  private async abortTarget(target: SiteTarget): Promise<void> {
    try {
      await target.abort();
    } catch (error) {
      this.logger.debug(`failed to discard partial site ${target.location}: ${errorMessage(error)}`);
    }
  }

  private async readSiteFile(relativePath: string): Promise<Buffer | null> {
    const { target, zip } = this.requireConfig();
    if (zip) {
      throw new Error('Reading records back is only supported for directory sites');
    }

    try {
      return await fs.promises.readFile(path.join(target, relativePath));
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  private requireConfig(): XrefConfig {
    if (!this.config) {
      throw new Error('xrefsite service is not initialized');
    }
    return this.config;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
