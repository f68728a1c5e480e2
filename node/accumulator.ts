import type { Position, Range, SemanticDocument, SymbolIndexRecord, SymbolName } from '../common/types';
import { isGlobalSymbol } from './symbols';

/**
 * Holds the current record of one symbol. Every change goes through
 * `update`, which runs the update function to completion on the event
 * loop, so two updates to the same slot never interleave.
 */
export class SymbolSlot {
  private value: SymbolIndexRecord;

  constructor(symbol: SymbolName) {
    this.value = { symbol, references: {} };
  }

  get(): SymbolIndexRecord {
    return this.value;
  }

  update(next: (current: SymbolIndexRecord) => SymbolIndexRecord): void {
    this.value = next(this.value);
  }
}

export interface AccumulatedIndex {
  symbols: ReadonlyMap<SymbolName, SymbolIndexRecord>;
  /** Distinct document URIs, sorted. */
  filenames: string[];
}

export class OccurrenceAccumulator {
  private readonly slots = new Map<SymbolName, SymbolSlot>();
  private readonly filenames = new Set<string>();
  private sealed = false;

  get size(): number {
    return this.slots.size;
  }

  slot(symbol: SymbolName): SymbolSlot {
    let slot = this.slots.get(symbol);
    if (!slot) {
      slot = new SymbolSlot(symbol);
      this.slots.set(symbol, slot);
    }
    return slot;
  }

  addDefinition(symbol: SymbolName, position: Position): void {
    this.assertOpen();
    this.slot(symbol).update((current) =>
      // Conflicting definitions (e.g. JVM and JS builds of one symbol): keep the first.
      current.definition ? current : { ...current, definition: position }
    );
  }

  addReference(filename: string, range: Range, symbol: SymbolName): void {
    this.assertOpen();
    this.slot(symbol).update((current) => {
      const ranges = current.references[filename] ?? [];
      return {
        ...current,
        references: { ...current.references, [filename]: [...ranges, range] },
      };
    });
  }

  /** Folds every global occurrence of one document into the index. */
  accumulate(document: SemanticDocument): void {
    this.assertOpen();

    for (const occurrence of document.occurrences) {
      const { symbol, range } = occurrence;
      if (!isGlobalSymbol(symbol) || !range) {
        continue;
      }

      if (occurrence.role === 'DEFINITION') {
        this.addDefinition(symbol, { filename: document.uri, ...copyRange(range) });
      } else if (occurrence.role === 'REFERENCE') {
        this.addReference(document.uri, copyRange(range), symbol);
      }
    }

    this.filenames.add(document.uri);
  }

  /**
   * Ends the accumulation phase and returns the settled records. Further
   * updates throw.
   */
  snapshot(): AccumulatedIndex {
    this.sealed = true;
    const symbols = new Map<SymbolName, SymbolIndexRecord>();
    for (const [symbol, slot] of this.slots) {
      symbols.set(symbol, slot.get());
    }
    return { symbols, filenames: [...this.filenames].sort() };
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new Error('Occurrence accumulator is sealed; snapshot() was already taken');
    }
  }
}

function copyRange(range: Range): Range {
  return {
    startLine: range.startLine,
    startCharacter: range.startCharacter,
    endLine: range.endLine,
    endCharacter: range.endCharacter,
  };
}
