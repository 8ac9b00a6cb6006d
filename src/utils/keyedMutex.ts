/**
 * Serialises async tasks that share a key. Tasks for different keys run
 * concurrently; tasks for the same key run one at a time in call order.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>()

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()

    let release: () => void = () => {}
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    try {
      await previous
      return await task()
    } finally {
      release()
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  /** Number of keys with a task running or queued. */
  get pendingKeys(): number {
    return this.tails.size
  }
}
