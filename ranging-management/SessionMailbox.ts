/**
 * Session Mailbox
 *
 * FIFO of work for one device. Tasks run one at a time in arrival order; an
 * async task holds the mailbox until it settles. A throwing task is reported
 * through onError and the next task still runs. Once closed, queued tasks
 * are dropped.
 */

export type MailboxTask = () => void | Promise<void>;
export type MailboxErrorHandler = (label: string, error: unknown) => void;

export class SessionMailbox {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;
  private closed = false;

  constructor(private readonly onError: MailboxErrorHandler) {}

  /**
   * Queue a task; the returned promise settles (never rejects) once it has run
   * or been dropped
   */
  post(label: string, task: MailboxTask): Promise<void> {
    if (this.closed) return Promise.resolve();

    this.queued++;
    const run = this.tail.then(async () => {
      try {
        if (!this.closed) {
          await task();
        }
      } catch (error) {
        this.onError(label, error);
      } finally {
        this.queued--;
      }
    });

    this.tail = run;
    return run;
  }

  /**
   * Resolves once everything queued so far has run
   */
  whenIdle(): Promise<void> {
    return this.tail;
  }

  get size(): number {
    return this.queued;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    this.closed = true;
  }
}
