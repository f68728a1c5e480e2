import chalk from 'chalk';

export const logger = {
  info(message: string): void {
    console.log(`${chalk.cyan('ℹ')} ${message}`);
  },

  success(message: string): void {
    console.log(`${chalk.green('✓')} ${message}`);
  },

  warn(message: string): void {
    console.error(`${chalk.yellow('⚠')} ${message}`);
  },

  error(message: string): void {
    console.error(`${chalk.red('✗')} ${message}`);
  },

  debug(message: string): void {
    if (process.env.DEBUG) {
      console.error(chalk.gray(`[debug] ${message}`));
    }
  },
};
