/**
 * Per-key serial execution.
 *
 * Tasks sharing a key run one at a time in submission order; tasks with
 * different keys run concurrently. A failing task does not block the ones
 * queued behind it.
 */

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>()
  private pending = new Map<string, number>()

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(task)
    const tail = result.then(
      () => undefined,
      () => undefined,
    )

    this.tails.set(key, tail)
    this.pending.set(key, (this.pending.get(key) ?? 0) + 1)

    void tail.then(() => {
      const left = (this.pending.get(key) ?? 1) - 1
      if (left === 0) {
        this.pending.delete(key)
        this.tails.delete(key)
      } else {
        this.pending.set(key, left)
      }
    })

    return result
  }

  /** Resolves once everything queued so far has settled. */
  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(this.tails.values())
    }
  }

  /** Tasks queued or running for a key. */
  queued(key: string): number {
    return this.pending.get(key) ?? 0
  }

  get activeKeys(): number {
    return this.tails.size
  }
}
