import fs from 'node:fs';
import path from 'node:path';
import { loadSync, type IConversionOptions, type Root, type Type } from 'protobufjs';
import { z } from 'zod';
import type { Range, SymbolIndexRecord, WorkspaceManifest } from '../common/types';

const SITE_PACKAGE = 'xrefsite';

export const TO_OBJECT_OPTIONS: IConversionOptions = {
  longs: Number,
  enums: String,
  defaults: true,
  arrays: true,
  objects: true,
};

export const rangeSchema = z.object({
  startLine: z.number().int(),
  startCharacter: z.number().int(),
  endLine: z.number().int(),
  endCharacter: z.number().int(),
});

const positionSchema = rangeSchema.extend({
  filename: z.string(),
});

const symbolIndexSchema = z.object({
  symbol: z.string(),
  definition: positionSchema.nullish(),
  references: z.record(z.object({ ranges: z.array(rangeSchema) })),
});

const workspaceSchema = z.object({
  filenames: z.array(z.string()),
});

const roots = new Map<string, Root>();

/**
 * Finds a bundled .proto file. Sources live one level below the repo root,
 * compiled output two levels below.
 */
export function resolveProtoPath(fileName: string): string {
  const candidates = [
    path.resolve(__dirname, '..', 'proto', fileName),
    path.resolve(__dirname, '..', '..', 'proto', fileName),
  ];
  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  throw new Error(`Schema ${fileName} not found. Expected proto/${fileName}`);
}

export function loadSchema(fileName: string): Root {
  let root = roots.get(fileName);
  if (!root) {
    root = loadSync(resolveProtoPath(fileName));
    roots.set(fileName, root);
  }
  return root;
}

function siteType(name: string): Type {
  return loadSchema(`${SITE_PACKAGE}.proto`).lookupType(`${SITE_PACKAGE}.${name}`);
}

export function encodeSymbolIndex(record: SymbolIndexRecord): Uint8Array {
  const type = siteType('SymbolIndex');
  const references = Object.fromEntries(
    Object.entries(record.references).map(([filename, ranges]) => [filename, { ranges: [...ranges] }])
  );
  const message = type.fromObject({
    symbol: record.symbol,
    definition: record.definition,
    references,
  });
  return type.encode(message).finish();
}

export function decodeSymbolIndex(bytes: Uint8Array): SymbolIndexRecord {
  const type = siteType('SymbolIndex');
  const parsed = symbolIndexSchema.parse(type.toObject(type.decode(bytes), TO_OBJECT_OPTIONS));
  const references: Record<string, Range[]> = Object.fromEntries(
    Object.entries(parsed.references).map(([filename, value]) => [filename, value.ranges])
  );

  if (parsed.definition) {
    return { symbol: parsed.symbol, definition: parsed.definition, references };
  }
  return { symbol: parsed.symbol, references };
}

export function encodeWorkspace(workspace: WorkspaceManifest): Uint8Array {
  const type = siteType('Workspace');
  return type.encode(type.fromObject({ filenames: workspace.filenames })).finish();
}

export function decodeWorkspace(bytes: Uint8Array): WorkspaceManifest {
  const type = siteType('Workspace');
  return workspaceSchema.parse(type.toObject(type.decode(bytes), TO_OBJECT_OPTIONS));
}
