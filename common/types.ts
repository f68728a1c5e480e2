export type SymbolName = string;

export interface Range {
  startLine: number;
  startCharacter: number;
  endLine: number;
  endCharacter: number;
}

export interface Position extends Range {
  filename: string;
}

export type ReferenceMap = Readonly<Record<string, readonly Range[]>>;

export interface SymbolIndexRecord {
  symbol: SymbolName;
  definition?: Position;
  references: ReferenceMap;
}

export interface WorkspaceManifest {
  filenames: string[];
}

export type OccurrenceRole = 'DEFINITION' | 'REFERENCE' | 'UNKNOWN_ROLE';

export interface SymbolOccurrence {
  symbol: SymbolName;
  role: OccurrenceRole;
  range?: Range;
}

export interface SemanticDocument {
  uri: string;
  occurrences: SymbolOccurrence[];
  /** Single-document TextDocuments encoding of this document. */
  bytes: Uint8Array;
}

export interface BuildResult {
  target: string;
  scannedFiles: number;
  indexedDocuments: number;
  skippedFiles: number;
  symbolCount: number;
  publishedSymbols: number;
  filenames: number;
  durationMs: number;
}

export interface SiteSummary {
  target: string;
  totalFiles: number;
  publishedSymbols: number;
  siteSize: number;
}

export interface XrefConfig {
  target: string;
  cleanTargetFirst: boolean;
  zip: boolean;
  nonInteractive: boolean;
  concurrency: number;
  publishTermAliases: boolean;
}
