import type { SignalingSocket } from "../../signaling-broker"
import { decodeSignalingMessage, type IncomingSignalingMessage } from "../../signaling-types"

/** Records everything the broker writes. Writes complete at once unless `holdWrites` is set. */
export class FakeSocket implements SignalingSocket {
  readonly sent: string[] = []
  open = true
  holdWrites = false
  failWrites: Error | null = null
  pings = 0
  closeCalls = 0
  terminateCalls = 0
  private readonly pending: Array<(error?: Error) => void> = []

  isOpen(): boolean {
    return this.open
  }

  send(data: string, done: (error?: Error) => void): void {
    this.sent.push(data)
    if (this.failWrites) {
      done(this.failWrites)
    } else if (this.holdWrites) {
      this.pending.push(done)
    } else {
      done()
    }
  }

  ping(): void {
    this.pings++
  }

  close(): void {
    this.closeCalls++
    this.open = false
  }

  terminate(): void {
    this.terminateCalls++
    this.open = false
  }

  /** Completes every held write. */
  flush(): void {
    for (const done of this.pending.splice(0)) done()
  }

  messages(): IncomingSignalingMessage[] {
    return this.sent.map((frame) => decodeSignalingMessage(frame))
  }

  clear(): void {
    this.sent.length = 0
  }
}
