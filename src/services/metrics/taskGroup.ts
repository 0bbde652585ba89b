import type { Logger } from 'pino';
import defaultLogger from '../../utils/logger';
import { DeadlineExceededError, getErrorMessage, sanitizeUpstreamError } from '../../utils/errors';

export interface TaskGroupOptions {
  /** Abort the shared signal this long after the group starts */
  deadlineMs: number;
  /** How long tasks get to wind down after the abort before they are abandoned */
  graceMs?: number;
  logger?: Logger;
}

const DEFAULT_GRACE_MS = 250;

/**
 * Structured fan-out for one collection cycle. Every spawned task shares one
 * AbortSignal that fires at the deadline. Spawned promises never reject: a
 * task that throws, or is still running when the grace period ends, resolves
 * to its fallback instead.
 */
export class TaskGroup {
  private controller = new AbortController();
  private pending: Set<string> = new Set();
  private deadlineTimer: NodeJS.Timeout;
  private hardStopTimer: NodeJS.Timeout | undefined;
  private hardStop: Promise<void>;
  private closed = false;
  private log: Logger;

  constructor(options: TaskGroupOptions) {
    const graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
    this.log = (options.logger ?? defaultLogger).child({ component: 'task-group' });

    this.hardStop = new Promise<void>(resolve => {
      this.hardStopTimer = setTimeout(resolve, options.deadlineMs + graceMs);
      this.hardStopTimer.unref();
    });

    this.deadlineTimer = setTimeout(() => {
      this.log.warn({ deadlineMs: options.deadlineMs, pending: [...this.pending] }, 'cycle deadline reached, aborting');
      this.controller.abort(new DeadlineExceededError());
    }, options.deadlineMs);
    this.deadlineTimer.unref();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get pendingTasks(): string[] {
    return [...this.pending];
  }

  spawn<T>(name: string, run: (signal: AbortSignal) => Promise<T>, fallback: (reason: string) => T): Promise<T> {
    if (this.closed) {
      return Promise.resolve(fallback('Task group closed'));
    }

    this.pending.add(name);
    let settled = false;

    const task = new Promise<T>(resolve => resolve(run(this.signal))).then(
      value => {
        settled = true;
        return value;
      },
      (error: unknown) => {
        settled = true;
        const reason = sanitizeUpstreamError(getErrorMessage(error));
        this.log.warn({ task: name, error: reason }, 'task failed, using fallback');
        return fallback(reason);
      }
    );

    const abandoned = this.hardStop.then(() => {
      if (!settled) {
        this.log.error({ task: name }, 'task ignored the deadline, abandoning it');
      }
      return fallback(new DeadlineExceededError().message);
    });

    return Promise.race([task, abandoned]).finally(() => {
      this.pending.delete(name);
    });
  }

  /** Stop the timers; call once every spawned promise has been awaited. */
  close(): void {
    this.closed = true;
    clearTimeout(this.deadlineTimer);
    clearTimeout(this.hardStopTimer);
  }
}
