/**
 * Task Manager
 *
 * The object the rest of the application talks to: admission (queue size, reservations,
 * enqueue) plus the worker lifecycle, tied to one root cancellation handle.
 */

import { AdmissionController, type Reservation } from './admission.ts';
import type { Task } from './task.ts';
import { Worker, type TaskProcessor, type WorkerState } from './worker.ts';
import { logger } from '../utils/logger.ts';

export class TaskManager {
  private readonly admission = new AdmissionController();
  private readonly worker: Worker;
  private readonly cancellation = new AbortController();

  constructor(processTask: TaskProcessor) {
    this.worker = new Worker(this.admission, processTask);
  }

  start(): void {
    this.worker.start(this.cancellation.signal);
    logger.debug('Task manager started');
  }

  /** Stops the worker after its current task. Queued tasks stay queued; see drain(). */
  async stop(): Promise<void> {
    this.cancellation.abort();
    await this.worker.stop();
    logger.debug('Task manager stopped');
  }

  queueSize(): number {
    return this.admission.queueSize();
  }

  /**
   * Reserves a place at the current queue size for a task about to be enqueued.
   * Keeps the count right between telling a user their position and enqueue().
   */
  reserve(): Reservation {
    return this.admission.reserve();
  }

  cancelReservation(reservation: Reservation): void {
    this.admission.cancelReservation(reservation);
  }

  enqueue(task: Task, reservation?: Reservation): void {
    this.admission.enqueue(task, reservation);
  }

  get workerState(): WorkerState {
    return this.worker.state;
  }

  /** Removes queued tasks and closes their completion channels. Use after stop(). */
  drain(reason: string): number {
    const pending = this.admission.drain();
    for (const task of pending) {
      task.completion.close(reason);
    }
    if (pending.length > 0) {
      logger.info({ abandoned: pending.length }, 'Queued tasks abandoned');
    }
    return pending.length;
  }
}
