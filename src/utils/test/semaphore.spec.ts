import { Semaphore, SemaphoreAbortedError } from '../semaphore';

describe('Semaphore', () => {
  it('rejects non-positive capacity', () => {
    expect(() => new Semaphore(0)).toThrow('positive integer');
  });

  it('limits concurrent holders and hands slots over in order', async () => {
    const sem = new Semaphore(2);
    const r1 = await sem.acquire();
    const r2 = await sem.acquire();
    expect(sem.inUse).toBe(2);

    const order: number[] = [];
    const p3 = sem.acquire().then((r) => {
      order.push(3);
      return r;
    });
    const p4 = sem.acquire().then((r) => {
      order.push(4);
      return r;
    });
    expect(sem.pending).toBe(2);

    r1();
    const r3 = await p3;
    expect(order).toEqual([3]);
    r2();
    const r4 = await p4;
    expect(order).toEqual([3, 4]);
    expect(sem.inUse).toBe(2);

    r3();
    r4();
    expect(sem.inUse).toBe(0);
  });

  it('ignores a second call to the same release', async () => {
    const sem = new Semaphore(1);
    const r = await sem.acquire();
    r();
    r();
    expect(sem.inUse).toBe(0);
    await sem.acquire();
    expect(sem.inUse).toBe(1);
  });

  it('drops an aborted waiter without consuming a slot', async () => {
    const sem = new Semaphore(1);
    const held = await sem.acquire();
    const ctrl = new AbortController();
    const waiting = sem.acquire(ctrl.signal);
    ctrl.abort();
    await expect(waiting).rejects.toBeInstanceOf(SemaphoreAbortedError);
    expect(sem.pending).toBe(0);
    held();
    expect(sem.inUse).toBe(0);
  });

  it('rejects immediately when the signal is already aborted', async () => {
    const sem = new Semaphore(1);
    const ctrl = new AbortController();
    ctrl.abort();
    await expect(sem.acquire(ctrl.signal)).rejects.toBeInstanceOf(
      SemaphoreAbortedError,
    );
    expect(sem.inUse).toBe(0);
  });

  it('run releases the slot when the task throws', async () => {
    const sem = new Semaphore(1);
    await expect(
      sem.run(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(sem.inUse).toBe(0);
  });
});
