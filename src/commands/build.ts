import chokidar from 'chokidar';
import { ConfigError, errorMessage } from '../../common/errors';
import type { XrefConfig } from '../../common/types';
import { isSemanticdbFile } from '../../node/semanticdb';
import { XrefNodeService } from '../../node/xrefNodeService';
import { prettyOutput } from '../output/pretty';
import { loadConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { splitClasspath } from '../utils/paths';
import { createXrefService } from '../utils/service';
import { spinner } from '../utils/spinner';

export interface BuildOptions {
  target?: string;
  cleanTargetFirst?: boolean;
  zip?: boolean;
  nonInteractive?: boolean;
  concurrency?: number;
  termAliases?: boolean;
  config?: string;
  watch?: boolean;
}

export async function buildCommand(classpathArgs: string[], options: BuildOptions = {}): Promise<void> {
  let service: XrefNodeService | undefined;

  try {
    const config = loadConfig({
      configPath: options.config,
      target: options.target,
      cleanTargetFirst: options.cleanTargetFirst,
      zip: options.zip,
      nonInteractive: options.nonInteractive,
      concurrency: options.concurrency,
      publishTermAliases: options.termAliases,
    });
    const classpath = splitClasspath(classpathArgs);
    if (classpath.length === 0) {
      throw new ConfigError('No classpath given. Pass one or more directories containing semanticdb files.');
    }

    service = await createXrefService(config, { showProgress: true });
    const result = await service.buildSite(classpath);
    prettyOutput.build(result);
    console.log(result.target);

    if (options.watch) {
      startWatchMode(classpath, config, service);
      return;
    }

    service.dispose();
  } catch (error) {
    if (spinner.isSpinning()) {
      spinner.fail('Build failed');
    }
    logger.error(`Failed to build site: ${errorMessage(error)}`);
    service?.dispose();
    process.exitCode = 1;
  }
}

function startWatchMode(classpath: string[], config: XrefConfig, service: XrefNodeService): void {
  logger.info('👀 Watching for semanticdb changes...');

  const watcher = chokidar.watch(classpath, {
    ignored: [config.target],
    persistent: true,
    ignoreInitial: true,
  });

  let debounceTimer: NodeJS.Timeout | undefined;
  let running = false;
  let pending = false;

  const schedule = (file: string): void => {
    if (!isSemanticdbFile(file)) {
      return;
    }
    if (debounceTimer) {
      clearTimeout(debounceTimer);
    }

    debounceTimer = setTimeout(() => {
      void rebuild();
    }, 700);
  };

  const rebuild = async (): Promise<void> => {
    if (running) {
      pending = true;
      return;
    }

    running = true;
    try {
      const result = await service.buildSite(classpath);
      logger.success(
        `Rebuilt ${result.publishedSymbols.toLocaleString()} symbols in ${(result.durationMs / 1000).toFixed(1)}s`
      );
    } catch (error) {
      if (spinner.isSpinning()) {
        spinner.fail('Rebuild failed');
      }
      logger.error(`Rebuild failed: ${errorMessage(error)}`);
    } finally {
      running = false;
      if (pending) {
        pending = false;
        void rebuild();
      }
    }
  };

  watcher.on('add', schedule);
  watcher.on('change', schedule);
  watcher.on('unlink', schedule);

  process.on('SIGINT', () => {
    if (debounceTimer) {
      clearTimeout(debounceTimer);
    }
    void watcher.close().finally(() => {
      service.dispose();
      logger.info('Stopped watch mode');
      process.exit(0);
    });
  });
}
