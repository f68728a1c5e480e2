import { describe, expect, it } from 'vitest';
import type { SymbolIndexRecord } from '../common/types';
import { OccurrenceAccumulator } from '../node/accumulator';
import { mergeReferences, reconcile, reconcileEntry } from '../node/reconciler';
import { document, occurrence, range } from './helpers';

const fooDefinition = { filename: 'Foo.scala', ...range(2, 6, 2, 9) };

function index(records: SymbolIndexRecord[]) {
  return {
    symbols: new Map(records.map((record) => [record.symbol, record])),
    filenames: [],
  };
}

describe('reconcile', () => {
  it('publishes one type entry carrying the term references', () => {
    const term = { symbol: 'pkg.Foo.', references: { 'Use.scala': [range(7, 2, 7, 5)] } };
    const type = { symbol: 'pkg.Foo#', definition: fooDefinition, references: {} };

    expect(reconcile(index([term, type]))).toEqual([
      {
        symbol: 'pkg.Foo#',
        definition: fooDefinition,
        references: { 'Foo.scala': [], 'Use.scala': [range(7, 2, 7, 5)] },
      },
    ]);
  });

  it('also publishes the term with the borrowed definition when aliases are enabled', () => {
    const term = { symbol: 'pkg.Foo.', references: { 'Use.scala': [range(7, 2, 7, 5)] } };
    const type = { symbol: 'pkg.Foo#', definition: fooDefinition, references: {} };

    const published = reconcile(index([term, type]), { publishTermAliases: true });

    expect(published.map((record) => record.symbol)).toEqual(['pkg.Foo.', 'pkg.Foo#']);
    expect(published[0]).toEqual({
      symbol: 'pkg.Foo.',
      definition: fooDefinition,
      references: { 'Foo.scala': [], 'Use.scala': [range(7, 2, 7, 5)] },
    });
  });

  it('appends the sibling references after the type own references', () => {
    const term = {
      symbol: 'pkg.Foo.',
      references: { 'Foo.scala': [range(10, 0, 10, 3)], 'Use.scala': [range(1, 0, 1, 3)] },
    };
    const type = { symbol: 'pkg.Foo#', definition: fooDefinition, references: { 'Foo.scala': [range(5, 0, 5, 3)] } };

    const [published] = reconcile(index([type, term]));

    expect(published.references).toEqual({
      'Foo.scala': [range(5, 0, 5, 3), range(10, 0, 10, 3)],
      'Use.scala': [range(1, 0, 1, 3)],
    });
  });

  it('leaves both siblings alone when both are defined', () => {
    const termDefinition = { filename: 'Foo.scala', ...range(20, 7, 20, 10) };
    const term = { symbol: 'pkg.Foo.', definition: termDefinition, references: { 'Use.scala': [range(1, 0, 1, 3)] } };
    const type = { symbol: 'pkg.Foo#', definition: fooDefinition, references: {} };

    expect(reconcile(index([term, type]))).toEqual([
      { symbol: 'pkg.Foo.', definition: termDefinition, references: { 'Foo.scala': [], 'Use.scala': [range(1, 0, 1, 3)] } },
      { symbol: 'pkg.Foo#', definition: fooDefinition, references: { 'Foo.scala': [] } },
    ]);
  });

  it('drops symbols that are referenced but never defined', () => {
    const external = { symbol: 'scala.Predef.println().', references: { 'A.scala': [range(3, 2, 3, 9)] } };

    expect(reconcile(index([external]))).toEqual([]);
  });

  it('does not modify the accumulated records', () => {
    const accumulator = new OccurrenceAccumulator();
    accumulator.accumulate(document('Foo.scala', [occurrence('pkg.Foo#', 'DEFINITION', range(2, 6, 2, 9))]));
    accumulator.accumulate(document('Use.scala', [occurrence('pkg.Foo.', 'REFERENCE', range(7, 2, 7, 5))]));
    const snapshot = accumulator.snapshot();

    reconcile(snapshot, { publishTermAliases: true });

    expect(snapshot.symbols.get('pkg.Foo#')?.references).toEqual({});
    expect(snapshot.symbols.get('pkg.Foo.')?.definition).toBeUndefined();
  });
});

describe('reconcileEntry', () => {
  it('reports which side was grafted', () => {
    const term = { symbol: 'pkg.Foo.', references: { 'Use.scala': [range(7, 2, 7, 5)] } };
    const type = { symbol: 'pkg.Foo#', definition: fooDefinition, references: {} };
    const symbols = index([term, type]).symbols;

    expect(reconcileEntry(type, symbols).graft).toBe('references');
    expect(reconcileEntry(term, symbols).graft).toBe('definition');
  });

  it('passes methods through unchanged', () => {
    const method = { symbol: 'pkg.Foo#run().', definition: fooDefinition, references: {} };

    expect(reconcileEntry(method, index([method]).symbols)).toEqual({ record: method, graft: null });
  });
});

describe('mergeReferences', () => {
  it('concatenates per file', () => {
    expect(
      mergeReferences({ 'A.scala': [range(1, 0, 1, 1)] }, { 'A.scala': [range(2, 0, 2, 1)], 'B.scala': [] })
    ).toEqual({ 'A.scala': [range(1, 0, 1, 1), range(2, 0, 2, 1)], 'B.scala': [] });
  });
});
