import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { DecodeError } from '../common/errors';
import { decodeTextDocuments, isSemanticdbFile, parseSemanticdbFile } from '../node/semanticdb';
import { makeTempDir, occurrence, range, textDocumentsBinary, textDocumentsJson, writeFile } from './helpers';

const fooDocument = {
  uri: 'src/main/scala/pkg/Foo.scala',
  occurrences: [
    occurrence('pkg.Foo#', 'DEFINITION', range(2, 6, 2, 9)),
    occurrence('pkg.Bar.', 'REFERENCE', range(3, 10, 3, 13)),
    occurrence('local0', 'DEFINITION', range(4, 8, 4, 9)),
  ],
};

describe('isSemanticdbFile', () => {
  it('accepts binary and JSON suffixes only', () => {
    expect(isSemanticdbFile('Foo.scala.semanticdb')).toBe(true);
    expect(isSemanticdbFile('Foo.scala.semanticdb.json')).toBe(true);
    expect(isSemanticdbFile('Foo.scala.json')).toBe(false);
    expect(isSemanticdbFile('Foo.semanticdb.bak')).toBe(false);
  });
});

describe('decodeTextDocuments', () => {
  it('decodes the binary encoding', () => {
    const [decoded] = decodeTextDocuments('Foo.scala.semanticdb', textDocumentsBinary([fooDocument]));

    expect(decoded.uri).toBe(fooDocument.uri);
    expect(decoded.occurrences).toEqual(fooDocument.occurrences);
  });

  it('decodes the JSON encoding', () => {
    const bytes = Buffer.from(textDocumentsJson([fooDocument]), 'utf8');
    const [decoded] = decodeTextDocuments('Foo.scala.semanticdb.json', bytes);

    expect(decoded.uri).toBe(fooDocument.uri);
    expect(decoded.occurrences).toEqual(fooDocument.occurrences);
  });

  it('fills omitted JSON fields with their defaults', () => {
    const json = JSON.stringify({
      documents: [{ uri: 'A.scala', occurrences: [{ symbol: 'pkg.A#', range: { endCharacter: 1 } }, { symbol: 'pkg.B#' }] }],
    });

    const [decoded] = decodeTextDocuments('A.scala.semanticdb.json', Buffer.from(json, 'utf8'));

    expect(decoded.occurrences).toEqual([
      { symbol: 'pkg.A#', role: 'UNKNOWN_ROLE', range: range(0, 0, 0, 1) },
      { symbol: 'pkg.B#', role: 'UNKNOWN_ROLE' },
    ]);
  });

  it('returns one entry per document in the file', () => {
    const other = { uri: 'B.scala', occurrences: [occurrence('pkg.Foo#', 'REFERENCE', range(5, 0, 5, 3))] };

    const decoded = decodeTextDocuments('x.semanticdb', textDocumentsBinary([fooDocument, other]));

    expect(decoded.map((doc) => doc.uri)).toEqual([fooDocument.uri, 'B.scala']);
  });

  it('re-encodes each document on its own', () => {
    const other = { uri: 'B.scala', occurrences: [occurrence('pkg.Foo#', 'REFERENCE', range(5, 0, 5, 3))] };
    const [, second] = decodeTextDocuments('x.semanticdb', textDocumentsBinary([fooDocument, other]));

    const copy = decodeTextDocuments('B.scala.semanticdb', second.bytes);

    expect(copy).toHaveLength(1);
    expect(copy[0].uri).toBe('B.scala');
    expect(copy[0].occurrences).toEqual(other.occurrences);
  });

  it('rejects unknown suffixes', () => {
    expect(() => decodeTextDocuments('Foo.class', new Uint8Array())).toThrow(DecodeError);
  });

  it('rejects malformed binary content', () => {
    const truncated = Uint8Array.from([0x0a, 0xff, 0xff, 0xff, 0xff, 0x0f]);

    expect(() => decodeTextDocuments('Foo.scala.semanticdb', truncated)).toThrow(DecodeError);
  });

  it('rejects malformed JSON content', () => {
    expect(() => decodeTextDocuments('Foo.scala.semanticdb.json', Buffer.from('{"documents": [', 'utf8'))).toThrow(
      DecodeError
    );
    expect(() => decodeTextDocuments('Foo.scala.semanticdb.json', Buffer.from('[]', 'utf8'))).toThrow(DecodeError);
  });
});

describe('parseSemanticdbFile', () => {
  it('reads and decodes a file from disk', async () => {
    const file = writeFile(path.join(makeTempDir(), 'Foo.scala.semanticdb'), textDocumentsBinary([fooDocument]));

    const [decoded] = await parseSemanticdbFile(file);

    expect(decoded.uri).toBe(fooDocument.uri);
  });

  it('reports unreadable files as decode errors', async () => {
    const missing = path.join(makeTempDir(), 'missing.semanticdb');

    await expect(parseSemanticdbFile(missing)).rejects.toBeInstanceOf(DecodeError);
  });
});
