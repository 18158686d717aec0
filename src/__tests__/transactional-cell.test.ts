import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { setTimeout as delay } from 'node:timers/promises';
import { TransactionalCell } from '../transactional-cell';

describe('TransactionalCell', () => {
  it('should read the initial value', () => {
    const cell = new TransactionalCell({ count: 1 });
    assert.deepEqual(cell.read(), { count: 1 });
    assert.equal(cell.revision, 0);
  });

  it('should replace the value on update', async () => {
    const cell = new TransactionalCell({ count: 1 });
    const before = cell.read();
    const after = await cell.update(v => ({ count: v.count + 1 }));
    assert.deepEqual(after, { count: 2 });
    assert.deepEqual(cell.read(), { count: 2 });
    assert.deepEqual(before, { count: 1 });
    assert.equal(cell.revision, 1);
  });

  it('should serialize async updates in submission order', async () => {
    const cell = new TransactionalCell<string[]>([]);
    const first = cell.update(async (v) => {
      await delay(20);
      return [...v, 'first'];
    });
    const second = cell.update(v => [...v, 'second']);
    await Promise.all([first, second]);
    assert.deepEqual(cell.read(), ['first', 'second']);
  });

  it('should leave the value untouched when an update fails', async () => {
    const cell = new TransactionalCell(10);
    await assert.rejects(cell.update(() => { throw new Error('nope'); }), { message: 'nope' });
    assert.equal(cell.read(), 10);
    assert.equal(cell.revision, 0);
    assert.equal(await cell.update(v => v + 1), 11);
  });

  it('should hand back a separate result from modify', async () => {
    const cell = new TransactionalCell(['a', 'b']);
    const popped = await cell.modify(v => ({ value: v.slice(1), result: v[0] }));
    assert.equal(popped, 'a');
    assert.deepEqual(cell.read(), ['b']);
  });

  it('should project through views', async () => {
    const cell = new TransactionalCell({ name: 'x', size: 3 });
    const size = cell.view(v => v.size);
    assert.equal(size.read(), 3);
    await cell.update(v => ({ ...v, size: 4 }));
    assert.equal(size.read(), 4);
  });
});
