import ora, { Ora } from 'ora';

const spinnerInstance: Ora = ora();

export const spinner = {
  start(text: string): void {
    spinnerInstance.start(text);
  },

  update(text: string): void {
    spinnerInstance.text = text;
  },

  succeed(text: string): void {
    spinnerInstance.succeed(text);
  },

  fail(text: string): void {
    spinnerInstance.fail(text);
  },

  isSpinning(): boolean {
    return spinnerInstance.isSpinning;
  },
};
