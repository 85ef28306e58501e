/**
 * Serializes async work per key. Tasks for the same user run one after the
 * other in arrival order; tasks for different users do not wait on each other.
 */
class UserLock {
  _tails: Map<string, Promise<void>>

  constructor() {
    this._tails = new Map()
  }

  async run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve()
    const result = previous.then(task)
    const tail = result.then(
      () => undefined,
      () => undefined,
    )
    this._tails.set(key, tail)
    try {
      return await result
    } finally {
      if (this._tails.get(key) === tail) this._tails.delete(key)
    }
  }

  isBusy(key: string): boolean {
    return this._tails.has(key)
  }
}

export { UserLock }
