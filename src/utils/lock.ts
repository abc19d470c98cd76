/**
 * Promise-chain mutual exclusion
 *
 * `KeyedLock` serializes tasks that share a key object; tasks on different
 * keys run independently. Keys are held weakly.
 */

export class KeyedLock<K extends object> {
  private readonly tails = new WeakMap<K, Promise<void>>();

  /**
   * Run `task` once every earlier task on the same key has settled.
   * The task's own result or rejection is passed through unchanged.
   */
  run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    return result;
  }
}
