import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../../common/errors';
import type { XrefConfig } from '../../common/types';

export const CONFIG_FILE = 'xrefsite.config.json';

const fileConfigSchema = z
  .object({
    target: z.string().min(1),
    cleanTargetFirst: z.boolean(),
    zip: z.boolean(),
    nonInteractive: z.boolean(),
    concurrency: z.number().int().positive(),
    publishTermAliases: z.boolean(),
  })
  .partial()
  .strict();

type FileConfig = z.infer<typeof fileConfigSchema>;

export interface ConfigOverrides extends Partial<XrefConfig> {
  configPath?: string;
}

export function defaultConcurrency(): number {
  return Math.max(1, os.cpus().length);
}

export function resolveConfigPath(custom?: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  if (custom) {
    if (!fs.existsSync(custom)) {
      throw new ConfigError(`Config file not found: ${custom}`);
    }
    return custom;
  }
  const envPath = env.XREFSITE_CONFIG;
  if (envPath && fs.existsSync(envPath)) {
    return envPath;
  }
  const defaultPath = path.join(process.cwd(), CONFIG_FILE);
  if (fs.existsSync(defaultPath)) {
    return defaultPath;
  }
  return undefined;
}

export function readConfigFile(configPath: string | undefined): FileConfig {
  if (!configPath) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config ${configPath}: ${issues}`);
  }
  return parsed.data;
}

/** Defaults, then the config file, then explicit overrides (CLI flags). */
export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): XrefConfig {
  const fileConfig = readConfigFile(resolveConfigPath(overrides.configPath, env));
  const target = overrides.target ?? fileConfig.target;
  if (!target) {
    throw new ConfigError('--target is required');
  }

  const concurrency = overrides.concurrency ?? fileConfig.concurrency ?? defaultConcurrency();
  if (!Number.isInteger(concurrency) || concurrency <= 0) {
    throw new ConfigError(`Invalid concurrency: ${concurrency}`);
  }

  return {
    target: path.resolve(target),
    cleanTargetFirst: overrides.cleanTargetFirst ?? fileConfig.cleanTargetFirst ?? false,
    zip: overrides.zip ?? fileConfig.zip ?? false,
    nonInteractive: overrides.nonInteractive ?? fileConfig.nonInteractive ?? false,
    concurrency,
    publishTermAliases: overrides.publishTermAliases ?? fileConfig.publishTermAliases ?? false,
  };
}
