import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';
import { ScanError } from '../common/errors';
import { runBounded } from './pool';
import { isSemanticdbFile, SEMANTICDB_JSON_SUFFIX, SEMANTICDB_SUFFIX } from './semanticdb';

export interface ScanOptions {
  concurrency?: number;
  /** Called once per classpath root after it has been walked. */
  onRoot?: (root: string) => void;
}

const PATTERNS = [`**/*${SEMANTICDB_SUFFIX}`, `**/*${SEMANTICDB_JSON_SUFFIX}`];

/**
 * Collects every SemanticDB file under the given classpath roots. Results
 * keep the order of the roots; files within a root are sorted.
 */
export async function scanSemanticdbs(classpath: string[], options: ScanOptions = {}): Promise<string[]> {
  const perRoot: string[][] = classpath.map(() => []);
  await runBounded(
    classpath.map((root, index) => ({ root, index })),
    options.concurrency ?? 1,
    async ({ root, index }) => {
      perRoot[index] = await scanRoot(root);
      options.onRoot?.(root);
    }
  );
  return perRoot.flat();
}

async function scanRoot(root: string): Promise<string[]> {
  const absolute = path.resolve(root);

  try {
    const stat = await fs.promises.stat(absolute);
    if (!stat.isDirectory()) {
      return stat.isFile() && isSemanticdbFile(absolute) ? [absolute] : [];
    }

    const matches = await fg(PATTERNS, {
      cwd: absolute,
      absolute: true,
      onlyFiles: true,
      dot: true,
      followSymbolicLinks: false,
      suppressErrors: false,
    });
    return matches.map((match) => path.normalize(match)).sort();
  } catch (error) {
    throw new ScanError(root, error);
  }
}
