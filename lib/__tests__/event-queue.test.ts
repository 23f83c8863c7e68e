import { afterEach, describe, expect, it, vi } from "vitest"
import { EventQueue, WaitTimeoutError, withDeadline } from "../event-queue"

type QueueItem = { kind: "a" | "b"; n: number }

describe("EventQueue", () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it("hands buffered items out in arrival order", async () => {
    const queue = new EventQueue<QueueItem>()
    queue.push({ kind: "a", n: 1 })
    queue.push({ kind: "a", n: 2 })

    await expect(queue.next(100)).resolves.toEqual({ kind: "a", n: 1 })
    await expect(queue.next(100)).resolves.toEqual({ kind: "a", n: 2 })
    expect(queue.size).toBe(0)
  })

  it("leaves unrelated items queued for later waits", async () => {
    const queue = new EventQueue<QueueItem>()
    queue.push({ kind: "a", n: 1 })
    queue.push({ kind: "b", n: 2 })

    await expect(queue.next(100, (e) => e.kind === "b")).resolves.toEqual({ kind: "b", n: 2 })
    expect(queue.size).toBe(1)
    await expect(queue.next(100)).resolves.toEqual({ kind: "a", n: 1 })
  })

  it("wakes a waiter only for an item it accepts", async () => {
    const queue = new EventQueue<QueueItem>()
    const waiting = queue.next(1000, (e) => e.kind === "b")

    queue.push({ kind: "a", n: 1 })
    queue.push({ kind: "b", n: 2 })

    await expect(waiting).resolves.toEqual({ kind: "b", n: 2 })
    expect(queue.size).toBe(1)
  })

  it("times out a wait nobody satisfies", async () => {
    vi.useFakeTimers()
    const queue = new EventQueue<QueueItem>()
    const waiting = queue.next(250, (e) => e.kind === "b")
    const assertion = expect(waiting).rejects.toThrow(WaitTimeoutError)

    queue.push({ kind: "a", n: 1 })
    await vi.advanceTimersByTimeAsync(250)

    await assertion
    await expect(waiting).rejects.toThrow("Timed out after 250ms")
    expect(queue.size).toBe(1)
  })

  it("rejects pending and later waits once closed", async () => {
    const queue = new EventQueue<QueueItem>()
    const waiting = queue.next(1000)

    queue.close(new Error("gone"))
    queue.push({ kind: "a", n: 1 })

    await expect(waiting).rejects.toThrow("gone")
    await expect(queue.next(1000)).rejects.toThrow("gone")
    expect(queue.closed).toBe(true)
  })

  it("still hands out what was buffered before closing", async () => {
    const queue = new EventQueue<QueueItem>()
    queue.push({ kind: "a", n: 1 })
    queue.close(new Error("gone"))

    await expect(queue.next(1000)).resolves.toEqual({ kind: "a", n: 1 })
  })
})

describe("withDeadline", () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it("settles with the work when it finishes first", async () => {
    await expect(withDeadline(Promise.resolve(7), 1000, () => new Error("late"))).resolves.toBe(7)
  })

  it("rejects with the timeout error when the work is too slow", async () => {
    vi.useFakeTimers()
    const slow = new Promise<number>(() => undefined)
    const result = withDeadline(slow, 500, () => new Error("late"))
    const assertion = expect(result).rejects.toThrow("late")

    await vi.advanceTimersByTimeAsync(500)
    await assertion
  })

  it("passes the work's own failure through", async () => {
    await expect(withDeadline(Promise.reject(new Error("broken")), 1000, () => new Error("late"))).rejects.toThrow(
      "broken",
    )
  })
})
