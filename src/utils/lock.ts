import { DataSource } from "typeorm";

/**
 * Runs async sections one at a time, in call order.
 */
export class StoreLock {
  private tail: Promise<void> = Promise.resolve();

  async run<T>(section: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await section();
    } finally {
      release();
    }
  }
}

const locks = new WeakMap<DataSource, StoreLock>();

/** The lock shared by every service writing to or reading from `dataSource`. */
export function storeLockFor(dataSource: DataSource): StoreLock {
  let lock = locks.get(dataSource);
  if (!lock) {
    lock = new StoreLock();
    locks.set(dataSource, lock);
  }
  return lock;
}
