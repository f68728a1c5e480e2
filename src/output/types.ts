import type { Position, Range } from '../../common/types';

export interface SymbolRecordOutput {
  symbol: string;
  digest: string;
  definition?: Position;
  references: Record<string, readonly Range[]>;
}
