import type { ReferenceMap, Range, SymbolIndexRecord, SymbolName } from '../common/types';
import type { AccumulatedIndex } from './accumulator';
import { namespaceSibling, parseGlobalSymbol } from './symbols';

export type Graft = 'references' | 'definition' | null;

export interface ReconciledEntry {
  record: SymbolIndexRecord;
  graft: Graft;
}

export interface ReconcileOptions {
  /**
   * Also publish a term whose definition was borrowed from its type sibling.
   * Its references are already part of the type's record.
   */
  publishTermAliases?: boolean;
}

/**
 * Resolves one record against its term/type sibling.
 *
 * A defined type absorbs the references of an undefined term sibling
 * (an object and its synthetic class, for instance). An undefined term
 * borrows the definition of a defined type sibling. When both siblings are
 * defined nothing moves.
 */
export function reconcileEntry(
  record: SymbolIndexRecord,
  symbols: ReadonlyMap<SymbolName, SymbolIndexRecord>
): ReconciledEntry {
  const kind = parseGlobalSymbol(record.symbol)?.kind;
  const siblingSymbol = namespaceSibling(record.symbol);
  const sibling = siblingSymbol ? symbols.get(siblingSymbol) : undefined;

  if (!sibling) {
    return { record, graft: null };
  }

  if (record.definition && kind === 'type' && !sibling.definition) {
    return {
      record: { ...record, references: mergeReferences(record.references, sibling.references) },
      graft: 'references',
    };
  }

  if (!record.definition && kind === 'term' && sibling.definition) {
    return {
      record: { ...record, definition: sibling.definition },
      graft: 'definition',
    };
  }

  return { record, graft: null };
}

/**
 * Produces the records to publish: every entry that owns a definition after
 * sibling resolution. Must run on a sealed snapshot.
 */
export function reconcile(index: AccumulatedIndex, options: ReconcileOptions = {}): SymbolIndexRecord[] {
  const published: SymbolIndexRecord[] = [];

  for (const record of index.symbols.values()) {
    const { record: resolved, graft } = reconcileEntry(record, index.symbols);
    if (!resolved.definition) {
      continue;
    }
    if (graft === 'definition' && !options.publishTermAliases) {
      continue;
    }
    published.push(withDefinitionFile(resolved));
  }

  return published;
}

export function mergeReferences(own: ReferenceMap, other: ReferenceMap): ReferenceMap {
  const merged = new Map<string, readonly Range[]>(Object.entries(own));
  for (const [filename, ranges] of Object.entries(other)) {
    merged.set(filename, [...(merged.get(filename) ?? []), ...ranges]);
  }
  return Object.fromEntries(merged);
}

function withDefinitionFile(record: SymbolIndexRecord): SymbolIndexRecord {
  const filename = record.definition?.filename;
  if (filename === undefined || Object.hasOwn(record.references, filename)) {
    return record;
  }
  const references = new Map<string, readonly Range[]>([[filename, []]]);
  for (const [file, ranges] of Object.entries(record.references)) {
    references.set(file, ranges);
  }
  return { ...record, references: Object.fromEntries(references) };
}
