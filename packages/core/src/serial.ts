import { AsyncLocalStorage } from 'async_hooks';

interface Section {
  active: boolean;
}

/**
 * Runs tasks one at a time in submission order. A task started from inside
 * a running section (same async context) executes inline instead of queueing
 * behind the section it belongs to.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private readonly scope = new AsyncLocalStorage<Section>();

  isInsideSection(): boolean {
    return this.scope.getStore()?.active === true;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    if (this.isInsideSection()) {
      return task();
    }

    const result = this.tail.then(() => this.enter(task));
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private enter<T>(task: () => Promise<T>): Promise<T> {
    const section: Section = { active: true };
    return this.scope.run(section, async () => {
      try {
        return await task();
      } finally {
        // Work the task scheduled but did not await must queue like anyone else.
        section.active = false;
      }
    });
  }
}
