import type { BuildResult, SiteSummary, SymbolIndexRecord, XrefConfig } from './types';

export interface IXrefService {
  initialize(config: XrefConfig): Promise<void>;

  buildSite(classpath: string[]): Promise<BuildResult>;
  lookupSymbol(symbol: string): Promise<SymbolIndexRecord | null>;
  readWorkspace(): Promise<string[]>;
  getSiteSummary(): Promise<SiteSummary>;

  dispose?(): void;
}
