import chalk from 'chalk';
import type { BuildResult, Range, SiteSummary } from '../../common/types';
import type { SymbolRecordOutput } from './types';

export const prettyOutput = {
  build(result: BuildResult): void {
    console.error(chalk.bold('\n📚 Site built\n'));
    console.error(`Metadata files: ${chalk.green(result.scannedFiles.toLocaleString())}`);
    console.error(`Documents:      ${chalk.green(result.indexedDocuments.toLocaleString())}`);
    if (result.skippedFiles > 0) {
      console.error(`Skipped:        ${chalk.yellow(result.skippedFiles.toLocaleString())}`);
    }
    console.error(`Symbols:        ${chalk.green(result.publishedSymbols.toLocaleString())} published of ${result.symbolCount.toLocaleString()}`);
    console.error(`Source files:   ${chalk.green(result.filenames.toLocaleString())}`);
    console.error(`Duration:       ${chalk.gray(`${(result.durationMs / 1000).toFixed(1)}s`)}\n`);
  },

  symbol(record: SymbolRecordOutput): void {
    console.log(chalk.bold(`\n${record.symbol}`));
    console.log(chalk.gray(`  ${record.digest}\n`));

    if (record.definition) {
      const { filename, ...range } = record.definition;
      console.log(`Defined in ${chalk.cyan(filename)} at ${formatRange(range)}`);
    } else {
      console.log(chalk.yellow('No definition'));
    }

    const files = Object.entries(record.references);
    const total = files.reduce((sum, [, ranges]) => sum + ranges.length, 0);
    console.log(chalk.bold(`\n${total} reference${total !== 1 ? 's' : ''}:\n`));
    for (const [file, ranges] of files) {
      console.log(chalk.cyan(`📄 ${file}`));
      if (ranges.length === 0) {
        console.log(chalk.gray('  (definition only)'));
      }
      for (const range of ranges) {
        console.log(`  ${formatRange(range)}`);
      }
    }
    console.log();
  },

  summary(summary: SiteSummary): void {
    console.log(chalk.bold('\n📊 Site Summary\n'));
    console.log(`Location:     ${chalk.green(summary.target)}`);
    console.log(`Files:        ${chalk.green(summary.totalFiles.toLocaleString())}`);
    console.log(`Symbols:      ${chalk.green(summary.publishedSymbols.toLocaleString())}`);
    console.log(`Site size:    ${chalk.gray(formatBytes(summary.siteSize))}`);
    console.log();
  },
};

/** One-based `line:column-line:column`, as editors show positions. */
export function formatRange(range: Range): string {
  return `${range.startLine + 1}:${range.startCharacter + 1}-${range.endLine + 1}:${range.endCharacter + 1}`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / 1024 / 1024).toFixed(1)} MB`;
}
