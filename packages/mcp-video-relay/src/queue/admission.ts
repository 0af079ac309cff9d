/**
 * Admission Controller
 *
 * Owns the work queue and the occupancy counters behind queueSize():
 * - queued: tasks sitting in the work queue
 * - reservations: positions already reported to a requester whose task is not enqueued yet
 * - inFlight: 1 while the worker runs a task
 *
 * Every mutation happens in a single synchronous step, so no caller can observe a task
 * counted twice or not at all.
 */

import { WorkQueue } from './work-queue.ts';
import type { Task } from './task.ts';

/** Handle for a place promised to one requester. Counts until it is enqueued or cancelled. */
export interface Reservation {
  /** Queue position reported to the requester (0 = processed right away). */
  readonly position: number;
}

export class AdmissionController {
  private readonly queue = new WorkQueue<Task>();
  private readonly reservations = new Set<Reservation>();
  private inFlight: 0 | 1 = 0;

  /** Queued + reserved + the task currently being processed. */
  queueSize(): number {
    return this.queue.size + this.reservations.size + this.inFlight;
  }

  /** Reserves a place for a task about to be enqueued, at the current queue size. */
  reserve(): Reservation {
    const reservation: Reservation = Object.freeze({ position: this.queueSize() });
    this.reservations.add(reservation);
    return reservation;
  }

  /** Gives back a reservation that will not be followed by enqueue(). No-op once used. */
  cancelReservation(reservation: Reservation): void {
    this.reservations.delete(reservation);
  }

  /**
   * Adds a task. With a live reservation the task takes its place; without one (or with a
   * used one) the task counts on its own.
   */
  enqueue(task: Task, reservation?: Reservation): void {
    if (reservation) this.reservations.delete(reservation);
    this.queue.push(task);
  }

  /**
   * Waits for the next task and marks it in flight as it leaves the queue.
   * Resolves with undefined, marking nothing, when the signal aborts first.
   */
  async dequeue(signal?: AbortSignal): Promise<Task | undefined> {
    const task = await this.queue.pop(signal, () => {
      this.inFlight = 1;
    });
    if (task === undefined) return undefined;
    if (signal?.aborted) {
      // Cancellation wins over a task that arrived in the same turn.
      this.inFlight = 0;
      this.queue.unshift(task);
      return undefined;
    }
    return task;
  }

  /** Clears the in-flight mark once the current task's result has been delivered. */
  settle(): void {
    this.inFlight = 0;
  }

  /** Removes every queued task, oldest first. Reservations and the in-flight task stay counted. */
  drain(): Task[] {
    return this.queue.drain();
  }
}
