import { errorMessage } from '../../common/errors';
import { jsonOutput } from '../output/json';
import { prettyOutput } from '../output/pretty';
import { loadConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { createXrefService, ensureSiteExists } from '../utils/service';

interface SummaryOptions {
  target?: string;
  config?: string;
  json?: boolean;
}

export async function summaryCommand(options: SummaryOptions = {}): Promise<void> {
  try {
    const config = loadConfig({ configPath: options.config, target: options.target, zip: false });
    ensureSiteExists(config);
    const service = await createXrefService(config);

    const summary = await service.getSiteSummary();
    service.dispose();

    if (options.json) {
      jsonOutput(summary);
    } else {
      prettyOutput.summary(summary);
    }
  } catch (error) {
    logger.error(`Failed to get summary: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}
