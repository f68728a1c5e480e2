import fs from 'node:fs';
import path from 'node:path';
import type { XrefConfig } from '../../common/types';
import { XrefNodeService } from '../../node/xrefNodeService';
import { WORKSPACE_FILE } from '../../node/siteTarget';
import { logger } from './logger';
import { createProgressReporter } from './progress';

export interface ServiceOptions {
  showProgress?: boolean;
}

export async function createXrefService(
  config: XrefConfig,
  options: ServiceOptions = {}
): Promise<XrefNodeService> {
  const service = new XrefNodeService({
    progress: options.showProgress ? createProgressReporter(config.nonInteractive) : undefined,
    logger: {
      warn: (message) => logger.warn(message),
      debug: (message) => logger.debug(message),
    },
  });

  await service.initialize(config);
  return service;
}

export function ensureSiteExists(config: XrefConfig): void {
  if (config.zip) {
    throw new Error('Zip sites cannot be queried; rebuild without --zip');
  }
  if (!fs.existsSync(path.join(config.target, WORKSPACE_FILE))) {
    throw new Error(`No site found in ${config.target}. Run \`xrefsite build\` first.`);
  }
}
