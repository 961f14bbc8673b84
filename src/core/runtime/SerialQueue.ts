import type pino from 'pino';
import { createLogger } from '../../utils/logger.js';

export type QueuedTask = () => void | Promise<void>;

/**
 * Single serialized execution context. Every state mutation that observers
 * can see goes through one of these, so reads never interleave with a write.
 *
 * Tasks always run asynchronously, after all previously enqueued tasks.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly logger: pino.Logger = createLogger({ component: 'SerialQueue' })) {}

  /** Resolves once `task` has run. Never rejects; a failing task is logged. */
  enqueue(task: QueuedTask): Promise<void> {
    const run = this.tail.then(task).catch((error: unknown) => {
      this.logger.error({ error }, 'Queued task failed');
    });
    this.tail = run;
    return run;
  }

  /** Waits for everything enqueued so far, including tasks those tasks enqueue. */
  async onIdle(): Promise<void> {
    let observed: Promise<void>;
    do {
      observed = this.tail;
      await observed;
    } while (observed !== this.tail);
  }
}
