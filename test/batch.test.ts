import { describe, it } from 'node:test';
import assert from 'node:assert';
import { runBatch } from '../src/batch.js';

describe('runBatch', () => {
  it('should keep results in input order', async () => {
    const results = await runBatch([30, 10, 20], async ms => {
      await new Promise(resolve => setTimeout(resolve, ms));
      return ms * 2;
    }, { concurrency: 3 });
    assert.deepStrictEqual(
      results.map(r => (r.status === 'fulfilled' ? r.value : null)),
      [60, 20, 40],
    );
  });

  it('should never exceed the concurrency limit', async () => {
    let running = 0;
    let peak = 0;
    await runBatch([1, 2, 3, 4, 5, 6], async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise(resolve => setTimeout(resolve, 5));
      running--;
    }, { concurrency: 2 });
    assert.strictEqual(peak, 2);
  });

  it('should report failures per item', async () => {
    const results = await runBatch(['ok', 'bad'], async item => {
      if (item === 'bad') throw new Error('no such container');
      return item.length;
    });
    assert.deepStrictEqual(results, [
      { item: 'ok', status: 'fulfilled', value: 2 },
      { item: 'bad', status: 'rejected', error: 'Error', reason: 'no such container' },
    ]);
  });

  it('should skip items not started before abort', async () => {
    const controller = new AbortController();
    const results = await runBatch(['a', 'b', 'c'], async item => {
      if (item === 'a') controller.abort();
      return item;
    }, { concurrency: 1, signal: controller.signal });
    assert.deepStrictEqual(results.map(r => r.status), ['fulfilled', 'skipped', 'skipped']);
  });

  it('should handle an empty list', async () => {
    assert.deepStrictEqual(await runBatch([], async () => 1), []);
  });
});
