import path from 'node:path';

/** Expands `a:b` style arguments into individual classpath roots. */
export function splitClasspath(args: string[], delimiter = path.delimiter): string[] {
  return args
    .flatMap((arg) => arg.split(delimiter))
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => path.resolve(entry));
}
