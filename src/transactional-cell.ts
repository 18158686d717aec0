/**
 * TransactionalCell
 *
 * A shared value with snapshot reads and serialized updates. Values are
 * treated as immutable: an update replaces the value, it never edits it in
 * place. Any number of read() calls made without awaiting in between observe
 * one consistent state, so projections over several cells compose without
 * locking.
 *
 * Updates run one after another in submission order, including async ones,
 * and each sees the result of the previous. A failed update leaves the value
 * untouched and rejects its own promise only.
 */

export interface ReadableCell<T> {
  read(): T;
}

export type CellUpdate<T> = (current: T) => T | Promise<T>;

export interface CellTransition<T, R> {
  value: T;
  result: R;
}

export class TransactionalCell<T> implements ReadableCell<T> {
  private value: T;
  private tail: Promise<unknown> = Promise.resolve();
  private version = 0;

  constructor(initial: T) {
    this.value = initial;
  }

  read(): T {
    return this.value;
  }

  /** Number of committed updates; bumps once per successful update() */
  get revision(): number {
    return this.version;
  }

  update(fn: CellUpdate<T>): Promise<T> {
    return this.modify(async (current) => {
      const value = await fn(current);
      return { value, result: value };
    });
  }

  /** Replace the value and hand a separate result back to the caller */
  modify<R>(fn: (current: T) => CellTransition<T, R> | Promise<CellTransition<T, R>>): Promise<R> {
    const run = async (): Promise<R> => {
      const next = await fn(this.value);
      this.value = next.value;
      this.version++;
      return next.result;
    };
    const result = this.tail.then(run);
    // The chain only orders updates; each caller observes its own outcome
    this.tail = result.catch(() => undefined);
    return result;
  }

  /** Read-only projection of this cell */
  view<U>(project: (value: T) => U): ReadableCell<U> {
    return { read: () => project(this.read()) };
  }
}
