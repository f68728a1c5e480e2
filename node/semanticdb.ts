import fs from 'node:fs';
import path from 'node:path';
import type { Type } from 'protobufjs';
import { z } from 'zod';
import { DecodeError, errorMessage } from '../common/errors';
import type { SemanticDocument, SymbolOccurrence } from '../common/types';
import { loadSchema, rangeSchema, TO_OBJECT_OPTIONS } from './schema';

export const SEMANTICDB_SUFFIX = '.semanticdb';
export const SEMANTICDB_JSON_SUFFIX = '.semanticdb.json';

const TEXT_DOCUMENTS = 'scala.meta.internal.semanticdb.TextDocuments';

const occurrenceSchema = z.object({
  range: rangeSchema.nullish(),
  symbol: z.string(),
  // Role values newer than the bundled schema decode as numbers.
  role: z.enum(['UNKNOWN_ROLE', 'REFERENCE', 'DEFINITION']).catch('UNKNOWN_ROLE'),
});

const textDocumentsSchema = z.object({
  documents: z.array(
    z
      .object({
        uri: z.string(),
        occurrences: z.array(occurrenceSchema),
      })
      .passthrough()
  ),
});

const jsonObjectSchema = z.record(z.unknown());

type DecodedMessage = ReturnType<Type['decode']>;

export function isSemanticdbFile(fileName: string): boolean {
  return fileName.endsWith(SEMANTICDB_SUFFIX) || fileName.endsWith(SEMANTICDB_JSON_SUFFIX);
}

function textDocumentsType(): Type {
  return loadSchema('semanticdb.proto').lookupType(TEXT_DOCUMENTS);
}

export async function parseSemanticdbFile(file: string): Promise<SemanticDocument[]> {
  let bytes: Buffer;
  try {
    bytes = await fs.promises.readFile(file);
  } catch (error) {
    throw new DecodeError(file, errorMessage(error), error);
  }
  return decodeTextDocuments(file, bytes);
}

/**
 * Decodes a `.semanticdb` (protobuf) or `.semanticdb.json` (proto3 JSON)
 * payload into one entry per contained document.
 */
export function decodeTextDocuments(file: string, bytes: Uint8Array): SemanticDocument[] {
  const type = textDocumentsType();

  try {
    const plain = textDocumentsSchema.parse(type.toObject(decodeMessage(type, file, bytes), TO_OBJECT_OPTIONS));
    return plain.documents.map((document) => ({
      uri: document.uri,
      occurrences: document.occurrences.map(
        (occurrence): SymbolOccurrence =>
          occurrence.range
            ? { symbol: occurrence.symbol, role: occurrence.role, range: occurrence.range }
            : { symbol: occurrence.symbol, role: occurrence.role }
      ),
      bytes: type.encode(type.fromObject({ documents: [document] })).finish(),
    }));
  } catch (error) {
    if (error instanceof DecodeError) {
      throw error;
    }
    throw new DecodeError(file, errorMessage(error), error);
  }
}

function decodeMessage(type: Type, file: string, bytes: Uint8Array): DecodedMessage {
  if (file.endsWith(SEMANTICDB_SUFFIX)) {
    return type.decode(bytes);
  }
  if (file.endsWith(SEMANTICDB_JSON_SUFFIX)) {
    const json = jsonObjectSchema.parse(JSON.parse(Buffer.from(bytes).toString('utf8')));
    return type.fromObject(json);
  }
  throw new DecodeError(file, `unexpected filename ${path.basename(file)}`);
}
