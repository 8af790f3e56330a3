/**
 * Locks baseados em encadeamento de promises. Só valem dentro de um processo.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve()

  /** Runs `fn` after every previously queued task settled; its result (or error) is returned as-is. */
  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(() => fn())
    this.tail = run.then(() => undefined, () => undefined)
    return run
  }
}

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>()

  runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve()
    const run = prev.then(() => fn())
    const tail = run.then(() => undefined, () => undefined)
    this.tails.set(key, tail)
    // libera a chave quando ninguém mais entrou na fila
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key)
    }, () => undefined)
    return run
  }

  get pending(): number {
    return this.tails.size
  }
}
