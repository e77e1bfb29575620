/**
 * Keyed async mutex. Callers sharing a key run one at a time, in call order;
 * different keys never wait on each other.
 */

const settle = (): void => undefined

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>()

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const run = previous.then(fn)
    // The tail only orders the next caller; this caller still sees run's rejection
    const tail = run.then(settle, settle)
    this.tails.set(key, tail)
    try {
      return await run
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key)
  }
}

/** Process-wide lock for credential generation, keyed by private key path */
export const keyGenerationLock = new KeyedMutex()
