import { createHash } from 'node:crypto';
import type { SemanticDocument, SymbolIndexRecord, SymbolName } from '../common/types';
import { runBounded } from './pool';
import { encodeSymbolIndex, encodeWorkspace } from './schema';
import { SEMANTICDB_SUFFIX } from './semanticdb';
import { SEMANTICDB_DIR, SYMBOL_DIR, WORKSPACE_FILE, type SiteTarget } from './siteTarget';

/**
 * File name of a symbol's record: the SHA-512 digest of its UTF-8 bytes as
 * 128 lowercase hex characters. Symbols are too long and too loosely
 * charactered to be used as paths directly.
 */
export function encodeSymbolName(symbol: SymbolName): string {
  return createHash('sha512').update(symbol, 'utf8').digest('hex');
}

export function symbolRecordPath(symbol: SymbolName): string {
  return `${SYMBOL_DIR}/${encodeSymbolName(symbol)}`;
}

export function documentCopyPath(uri: string): string {
  return `${SEMANTICDB_DIR}/${uri}${SEMANTICDB_SUFFIX}`;
}

export class IndexWriter {
  private readonly copiedUris = new Set<string>();

  constructor(
    private readonly target: SiteTarget,
    private readonly concurrency = 1
  ) {}

  /** Copies a document once per uri; later documents with the same uri are skipped. */
  async writeDocument(document: SemanticDocument): Promise<void> {
    if (this.copiedUris.has(document.uri)) {
      return;
    }
    this.copiedUris.add(document.uri);
    await this.target.write(documentCopyPath(document.uri), document.bytes);
  }

  async writeSymbolIndex(records: SymbolIndexRecord[], onWritten?: () => void): Promise<number> {
    await runBounded(records, this.concurrency, async (record) => {
      await this.target.write(symbolRecordPath(record.symbol), encodeSymbolIndex(record));
      onWritten?.();
    });
    return records.length;
  }

  async writeWorkspace(filenames: string[]): Promise<void> {
    await this.target.write(WORKSPACE_FILE, encodeWorkspace({ filenames }));
  }
}
