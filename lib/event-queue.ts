// Selective, time-bounded waiting over a stream of events

export class WaitTimeoutError extends Error {
  readonly timeoutMs: number

  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`)
    this.name = "WaitTimeoutError"
    this.timeoutMs = timeoutMs
  }
}

interface Waiter<T> {
  accept: (item: T) => boolean
  resolve: (item: T) => void
  reject: (error: Error) => void
}

const acceptAll = (): boolean => true

/**
 * Items nobody is waiting for are kept in arrival order, so a waiter only
 * consumes the events it asked for and the rest stay available to later
 * waits.
 */
export class EventQueue<T> {
  private readonly buffered: T[] = []
  private readonly waiters = new Set<Waiter<T>>()
  private failure: Error | null = null

  get closed(): boolean {
    return this.failure !== null
  }

  get size(): number {
    return this.buffered.length
  }

  push(item: T): void {
    if (this.failure) return

    for (const waiter of this.waiters) {
      if (waiter.accept(item)) {
        this.waiters.delete(waiter)
        waiter.resolve(item)
        return
      }
    }
    this.buffered.push(item)
  }

  next(timeoutMs: number, accept: (item: T) => boolean = acceptAll): Promise<T> {
    const index = this.buffered.findIndex(accept)
    if (index !== -1) {
      return Promise.resolve(this.buffered.splice(index, 1)[0])
    }
    if (this.failure) {
      return Promise.reject(this.failure)
    }

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiters.delete(waiter)
        reject(new WaitTimeoutError(timeoutMs))
      }, timeoutMs)

      const waiter: Waiter<T> = {
        accept,
        resolve: (item) => {
          clearTimeout(timer)
          resolve(item)
        },
        reject: (error) => {
          clearTimeout(timer)
          reject(error)
        },
      }
      this.waiters.add(waiter)
    })
  }

  /** Rejects current and future waits once the buffer holds nothing they accept. */
  close(error: Error): void {
    if (this.failure) return
    this.failure = error
    for (const waiter of this.waiters) {
      waiter.reject(error)
    }
    this.waiters.clear()
  }
}

export class Deferred<T> {
  readonly promise: Promise<T>
  resolve: (value: T) => void = () => undefined
  reject: (reason: unknown) => void = () => undefined

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve
      this.reject = reject
    })
  }
}

/** Settles with `work`, or with `onTimeout()` if `timeoutMs` passes first. */
export function withDeadline<T>(work: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), timeoutMs)
    work.then(
      (value) => {
        clearTimeout(timer)
        resolve(value)
      },
      (error: unknown) => {
        clearTimeout(timer)
        reject(error)
      },
    )
  })
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
