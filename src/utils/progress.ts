import type { ProgressObserver } from '../../node/progress';
import { logger } from './logger';
import { spinner } from './spinner';

export function formatProgress(task: string, completed: number, total: number): string {
  const percent = total > 0 ? Math.floor((completed / total) * 100) : 100;
  return `${task} ${completed.toLocaleString()}/${total.toLocaleString()} (${percent}%)`;
}

const spinnerProgress: ProgressObserver = {
  start(task, total) {
    spinner.start(formatProgress(task, 0, total));
  },
  tick(task, completed, total) {
    spinner.update(formatProgress(task, completed, total));
  },
  complete(task, success) {
    if (success) {
      spinner.succeed(task);
    } else {
      spinner.fail(task);
    }
  },
};

const logProgress: ProgressObserver = {
  start(task, total) {
    logger.info(`${task} (${total.toLocaleString()})`);
  },
  tick() {
    // Plain output only reports phase boundaries.
  },
  complete(task, success) {
    if (success) {
      logger.success(task);
    } else {
      logger.error(`${task} failed`);
    }
  },
};

export function isInteractive(nonInteractive: boolean): boolean {
  return !nonInteractive && Boolean(process.stderr.isTTY) && !process.env.CI;
}

export function createProgressReporter(nonInteractive: boolean): ProgressObserver {
  return isInteractive(nonInteractive) ? spinnerProgress : logProgress;
}
