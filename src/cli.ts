#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { buildCommand } from './commands/build';
import { lookupCommand } from './commands/lookup';
import { summaryCommand } from './commands/summary';
import pkg from '../package.json';

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name('xrefsite')
  .description('Static cross-reference site from SemanticDB metadata')
  .version(pkg.version);

program
  .command('build')
  .description('Index semanticdb files on a classpath and write the site')
  .argument('[classpath...]', 'Directories to scan; entries may be joined with the path delimiter')
  .option('-t, --target <dir>', 'Output directory of the site (required)')
  .option('--clean-target-first', 'Delete the whole target directory before building')
  .option('--zip', 'Write the site into a single xrefsite.zip archive')
  .option('--non-interactive', 'Disable the progress spinner')
  .option('--concurrency <n>', 'Maximum parallel file tasks', parsePositiveInt)
  .option('--term-aliases', 'Also publish terms that borrow their type sibling definition')
  .option('-c, --config <file>', 'Config file (default: ./xrefsite.config.json)')
  .option('--watch', 'Rebuild when semanticdb files change')
  .action(buildCommand);

program
  .command('lookup <symbol>')
  .description('Show the published record of a symbol')
  .option('-t, --target <dir>', 'Site directory')
  .option('-c, --config <file>', 'Config file')
  .option('--json', 'Output as JSON')
  .action(lookupCommand);

program
  .command('summary')
  .description('Site statistics')
  .option('-t, --target <dir>', 'Site directory')
  .option('-c, --config <file>', 'Config file')
  .option('--json', 'Output as JSON')
  .action(summaryCommand);

program.addHelpText(
  'after',
  `
Examples:
  xrefsite build --target site target/classes     Build a site from compiled output
  xrefsite build -t site a/classes:b/classes      Several roots in one argument
  xrefsite lookup 'com/example/Foo#' -t site      Show where Foo is defined and used
  xrefsite summary -t site --json                 Site statistics as JSON
`
);

void program.parseAsync(process.argv);
