import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AdmissionController } from '../src/queue/admission.ts';
import { makeTask } from './fakes.ts';

describe('AdmissionController', () => {
  it('counts N enqueued tasks as N', () => {
    const admission = new AdmissionController();
    for (let i = 0; i < 7; i++) {
      admission.enqueue(makeTask(`https://example.com/${i}`).task);
    }
    assert.equal(admission.queueSize(), 7);
  });

  it('reports positions on reserve and reconciles them on enqueue', () => {
    const admission = new AdmissionController();

    const a = admission.reserve();
    const b = admission.reserve();
    const c = admission.reserve();
    assert.deepEqual([a.position, b.position, c.position], [0, 1, 2]);
    assert.equal(admission.queueSize(), 3);

    admission.enqueue(makeTask('https://example.com/a').task, a);
    assert.equal(admission.queueSize(), 3);
    admission.enqueue(makeTask('https://example.com/b').task, b);
    admission.enqueue(makeTask('https://example.com/c').task, c);
    assert.equal(admission.queueSize(), 3);
  });

  it('does not let an unreserved task take another requester\'s place', () => {
    const admission = new AdmissionController();

    const reservation = admission.reserve();
    assert.equal(reservation.position, 0);
    admission.enqueue(makeTask('https://example.com/other').task);
    assert.equal(admission.queueSize(), 2);

    admission.enqueue(makeTask('https://example.com/mine').task, reservation);
    assert.equal(admission.queueSize(), 2);
  });

  it('reconciles a reservation only once', () => {
    const admission = new AdmissionController();

    const reservation = admission.reserve();
    admission.enqueue(makeTask('https://example.com/a').task, reservation);
    admission.enqueue(makeTask('https://example.com/b').task, reservation);
    assert.equal(admission.queueSize(), 2);
  });

  it('gives back a cancelled reservation exactly once', () => {
    const admission = new AdmissionController();

    const first = admission.reserve();
    const second = admission.reserve();
    admission.cancelReservation(first);
    assert.equal(admission.queueSize(), 1);

    admission.cancelReservation(first);
    assert.equal(admission.queueSize(), 1);

    admission.cancelReservation(second);
    assert.equal(admission.queueSize(), 0);
  });

  it('returns the same size on repeated calls', () => {
    const admission = new AdmissionController();
    admission.enqueue(makeTask('https://example.com/a').task, admission.reserve());
    admission.reserve();

    assert.equal(admission.queueSize(), 2);
    assert.equal(admission.queueSize(), 2);
    assert.equal(admission.queueSize(), 2);
  });

  it('keeps a dequeued task counted until it is settled', async () => {
    const admission = new AdmissionController();
    const first = makeTask('https://example.com/1').task;
    admission.enqueue(first);
    admission.enqueue(makeTask('https://example.com/2').task);

    const task = await admission.dequeue();
    assert.equal(task, first);
    assert.equal(admission.queueSize(), 2);

    admission.settle();
    assert.equal(admission.queueSize(), 1);
  });

  it('counts a task handed to a waiting dequeue as in flight immediately', () => {
    const admission = new AdmissionController();
    void admission.dequeue();

    admission.enqueue(makeTask('https://example.com/1').task);
    assert.equal(admission.queueSize(), 1);
    assert.deepEqual(admission.drain(), []);
    assert.equal(admission.queueSize(), 1);
  });

  it('puts a task back when cancellation arrives in the same turn', async () => {
    const admission = new AdmissionController();
    const controller = new AbortController();
    const pending = admission.dequeue(controller.signal);

    const task = makeTask('https://example.com/1').task;
    admission.enqueue(task);
    controller.abort();

    assert.equal(await pending, undefined);
    assert.equal(admission.queueSize(), 1);
    assert.deepEqual(admission.drain(), [task]);
    assert.equal(admission.queueSize(), 0);
  });

  it('drain removes queued tasks only', () => {
    const admission = new AdmissionController();
    const a = makeTask('https://example.com/a').task;
    const b = makeTask('https://example.com/b').task;
    admission.enqueue(a);
    admission.enqueue(b);
    admission.reserve();

    assert.deepEqual(admission.drain(), [a, b]);
    assert.equal(admission.queueSize(), 1);
  });
});
