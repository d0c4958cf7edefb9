/**
 * Runs async tasks one after another. Used to keep two batches from writing
 * to the same calendar at once.
 */
export function createTaskQueue() {
  let tail: Promise<unknown> = Promise.resolve();

  return function enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = tail.then(task);
    // The caller observes the rejection through `run`; the chain only needs to continue.
    tail = run.catch(() => undefined);
    return run;
  };
}
