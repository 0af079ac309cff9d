/**
 * Worker
 *
 * Single loop that takes tasks from the admission controller in FIFO order, runs the
 * pipeline for one task at a time and delivers the result on the task's completion channel.
 *
 * idle → busy → idle → … → stopped
 *
 * Cancellation is looked at before every dequeue and never interrupts a running task.
 * A failing task produces a failure result; it never ends the loop.
 */

import type { AdmissionController } from './admission.ts';
import type { Task, TaskOutput, TaskResult } from './task.ts';
import { ChannelClosedError, failureReason } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';

export type WorkerState = 'idle' | 'busy' | 'stopped';

export type TaskProcessor = (task: Task) => Promise<TaskOutput>;

export class Worker {
  private currentState: WorkerState = 'idle';
  private controller: AbortController | null = null;
  private loop: Promise<void> = Promise.resolve();

  constructor(
    private readonly admission: AdmissionController,
    private readonly processTask: TaskProcessor,
  ) {}

  get state(): WorkerState {
    return this.currentState;
  }

  /** Starts the loop. `cancellation` is the parent handle; aborting it stops the worker too. */
  start(cancellation?: AbortSignal): void {
    if (this.controller && !this.controller.signal.aborted) return;

    const controller = new AbortController();
    const onParentAbort = () => controller.abort();
    if (cancellation?.aborted) {
      controller.abort();
    } else {
      cancellation?.addEventListener('abort', onParentAbort, { once: true });
    }

    this.controller = controller;
    this.currentState = 'idle';
    this.loop = this.run(controller.signal)
      .catch((error: unknown) => {
        logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Worker loop crashed');
        this.currentState = 'stopped';
      })
      .finally(() => {
        cancellation?.removeEventListener('abort', onParentAbort);
      });
  }

  /** Requests cancellation and resolves once the current task (if any) has been delivered. */
  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
  }

  private async run(signal: AbortSignal): Promise<void> {
    logger.debug('Worker started');

    while (!signal.aborted) {
      const task = await this.admission.dequeue(signal);
      if (!task) break;

      this.currentState = 'busy';
      try {
        await this.handleTask(task);
      } catch (error) {
        logger.error({ url: task.url, error: error instanceof Error ? error.message : String(error) }, 'Task handling failed');
      } finally {
        this.admission.settle();
        this.currentState = 'idle';
      }
    }

    this.currentState = 'stopped';
    logger.debug('Worker stopped');
  }

  private async handleTask(task: Task): Promise<void> {
    const started = Date.now();
    logger.info({ url: task.url, fallback: task.enableFallback }, 'Task started');

    let result: TaskResult;
    try {
      result = { ok: true, output: await this.processTask(task) };
    } catch (error) {
      result = { ok: false, reason: failureReason(error) };
    }

    logger.info(
      { url: task.url, ok: result.ok, reason: result.ok ? undefined : result.reason, ms: Date.now() - started },
      'Task finished',
    );

    if (task.completion.send(result)) return;

    const closed = new ChannelClosedError('failed to send task result: channel closed');
    logger.error({ url: task.url, code: closed.code }, closed.message);
    if (result.ok) {
      // nobody will take ownership of the artifacts
      const { storage } = result.output;
      await storage.release().catch((error: unknown) => {
        logger.error(
          { path: storage.path, error: error instanceof Error ? error.message : String(error) },
          'Failed to release undelivered output',
        );
      });
    }
  }
}
