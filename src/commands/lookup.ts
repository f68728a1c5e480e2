import { errorMessage } from '../../common/errors';
import { encodeSymbolName } from '../../node/indexWriter';
import { jsonOutput } from '../output/json';
import { prettyOutput } from '../output/pretty';
import { loadConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { createXrefService, ensureSiteExists } from '../utils/service';

interface LookupOptions {
  target?: string;
  config?: string;
  json?: boolean;
}

export async function lookupCommand(symbol: string, options: LookupOptions = {}): Promise<void> {
  try {
    const config = loadConfig({ configPath: options.config, target: options.target, zip: false });
    ensureSiteExists(config);
    const service = await createXrefService(config);

    const record = await service.lookupSymbol(symbol);
    service.dispose();
    if (!record) {
      throw new Error(`Symbol not found in site: ${symbol}`);
    }

    const output = { ...record, digest: encodeSymbolName(record.symbol) };
    if (options.json) {
      jsonOutput(output);
    } else {
      prettyOutput.symbol(output);
    }
  } catch (error) {
    logger.error(`Lookup failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}
