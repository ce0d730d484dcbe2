/** Runs tasks that share a key one after another, in arrival order. */
export class KeyedLock<K> {
  private tails = new Map<K, Promise<void>>();

  run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail: Promise<void> = result.then(
      () => this.release(key, tail),
      () => this.release(key, tail)
    );
    this.tails.set(key, tail);
    return result;
  }

  get size() {
    return this.tails.size;
  }

  private release(key: K, tail: Promise<void>) {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}
