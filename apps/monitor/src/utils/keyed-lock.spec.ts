import { KeyedLock } from './keyed-lock';

const flush = () => new Promise<void>(resolve => setImmediate(resolve));

const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(res => {
    resolve = res;
  });
  return { promise, resolve };
};

describe('KeyedLock', () => {
  let lock: KeyedLock;

  beforeEach(() => {
    lock = new KeyedLock();
  });

  it('should run work for one key in call order without overlap', async () => {
    const order: string[] = [];
    const first = deferred<string>();

    const a = lock.run('AAPL', async () => {
      order.push('first:start');
      const value = await first.promise;
      order.push('first:end');
      return value;
    });
    const b = lock.run('AAPL', async () => {
      order.push('second');
      return 'b';
    });

    await flush();
    expect(order).toEqual(['first:start']);
    expect(lock.isLocked('AAPL')).toBe(true);

    first.resolve('a');
    await expect(Promise.all([a, b])).resolves.toEqual(['a', 'b']);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should let different keys run independently', async () => {
    const blocked = deferred<void>();
    const started: string[] = [];

    const a = lock.run('AAPL', async () => {
      started.push('AAPL');
      await blocked.promise;
    });
    const b = lock.run('MSFT', async () => {
      started.push('MSFT');
    });

    await b;
    expect(started).toEqual(['AAPL', 'MSFT']);
    expect(lock.size()).toBe(1);

    blocked.resolve();
    await a;
  });

  it('should keep going after a failed task', async () => {
    const failing = lock.run('AAPL', async () => {
      throw new Error('boom');
    });
    const next = lock.run('AAPL', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('should release the key when idle', async () => {
    await lock.run('AAPL', async () => 1);

    expect(lock.isLocked('AAPL')).toBe(false);
    expect(lock.size()).toBe(0);
  });
});
