/**
 * Runs tasks one at a time in submission order. A task starts only after the
 * previous one settled; a failing task rejects its own promise and does not
 * stall the queue.
 */
export class SerialQueue {
  #tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T> | T): Promise<T> {
    const result = this.#tail.then(task);
    this.#tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
