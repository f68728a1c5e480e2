import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { OccurrenceRole, Range, SemanticDocument, SymbolOccurrence } from '../common/types';
import { loadSchema } from '../node/schema';

export function range(startLine: number, startCharacter: number, endLine: number, endCharacter: number): Range {
  return { startLine, startCharacter, endLine, endCharacter };
}

export function occurrence(symbol: string, role: OccurrenceRole, at?: Range): SymbolOccurrence {
  return at ? { symbol, role, range: at } : { symbol, role };
}

export function document(uri: string, occurrences: SymbolOccurrence[]): SemanticDocument {
  return { uri, occurrences, bytes: new Uint8Array() };
}

interface DocumentFixture {
  uri: string;
  occurrences: SymbolOccurrence[];
}

export function textDocumentsJson(documents: DocumentFixture[]): string {
  return JSON.stringify({ documents });
}

export function textDocumentsBinary(documents: DocumentFixture[]): Uint8Array {
  const type = loadSchema('semanticdb.proto').lookupType('scala.meta.internal.semanticdb.TextDocuments');
  return type.encode(type.fromObject({ documents })).finish();
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'xrefsite-'));
}

export function writeFile(file: string, contents: string | Uint8Array): string {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, contents);
  return file;
}
