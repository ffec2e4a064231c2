import { describe, expect, it } from 'vitest';
import { Mutex } from '../../src/openrgb/mutex.js';

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('Mutex', () => {
  it('should run sections one at a time in request order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const section = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      mutex.runExclusive(section('a')),
      mutex.runExclusive(section('b')),
      mutex.runExclusive(section('c')),
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('should release the lock when a section fails', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(async () => {
        throw new Error('section failed');
      }),
    ).rejects.toThrow('section failed');
    await expect(mutex.runExclusive(async () => 'next')).resolves.toBe('next');
  });

  it('should count queued and running sections', async () => {
    const mutex = new Mutex();
    let release: () => void = () => undefined;
    const blocked = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = mutex.runExclusive(() => blocked);
    const second = mutex.runExclusive(async () => undefined);
    expect(mutex.pending).toBe(2);

    release();
    await Promise.all([first, second]);
    expect(mutex.pending).toBe(0);
  });
});
