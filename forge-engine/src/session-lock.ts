/*
 * This file is part of TREB.
 *
 * TREB is free software: you can redistribute it and/or modify it under the 
 * terms of the GNU General Public License as published by the Free Software 
 * Foundation, either version 3 of the License, or (at your option) any 
 * later version.
 *
 * TREB is distributed in the hope that it will be useful, but WITHOUT ANY 
 * WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS 
 * FOR A PARTICULAR PURPOSE. See the GNU General Public License for more 
 * details.
 *
 * You should have received a copy of the GNU General Public License along 
 * with TREB. If not, see <https://www.gnu.org/licenses/>. 
 *
 * Copyright 2022-2025 trebco, llc. 
 * info@treb.app
 * 
 */

/**
 * one exclusive session per key. callers queue in arrival order; keys
 * are independent.
 */
export class SessionLock {

  /** last queued session per key. resolves when that session ends */
  protected tails: Map<string, Promise<void>> = new Map();

  /** number of keys with an active or queued session */
  public get size(): number {
    return this.tails.size;
  }

  /**
   * run a task once every earlier task on the same key has finished.
   * the lock is released however the task ends.
   */
  public async Run<T>(key: string, task: () => Promise<T>): Promise<T> {

    const previous = this.tails.get(key) || Promise.resolve();

    let release = () => { /* replaced below */ };
    const done = new Promise<void>(resolve => { release = resolve; });
    const tail = previous.then(() => done);

    this.tails.set(key, tail);

    await previous;

    try {
      return await task();
    }
    finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }

  }

}
