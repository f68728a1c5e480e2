/**
 * Receives phase progress from the pipeline. Purely informational: nothing
 * the observer does changes what gets built.
 */
export interface ProgressObserver {
  start(task: string, total: number): void;
  tick(task: string, completed: number, total: number): void;
  complete(task: string, success: boolean): void;
}

export type Tick = () => void;

export async function phase<T>(
  observer: ProgressObserver | undefined,
  task: string,
  total: number,
  run: (tick: Tick) => Promise<T>
): Promise<T> {
  observer?.start(task, total);
  let completed = 0;
  const tick: Tick = () => {
    completed += 1;
    observer?.tick(task, completed, total);
  };

  try {
    const result = await run(tick);
    observer?.complete(task, true);
    return result;
  } catch (error) {
    observer?.complete(task, false);
    throw error;
  }
}
