import { TransportError } from "../../errors"
import { EventQueue } from "../../event-queue"
import type { BrokerConnection, SignalingBroker } from "../../signaling-broker"
import type { SignalingChannel } from "../../signaling-client"
import {
  decodeSignalingMessage,
  encodeSignalingMessage,
  type IncomingSignalingMessage,
  type SignalingMessage,
} from "../../signaling-types"

/** A peer wired straight into a broker, with frames crossing on the microtask queue. */
export class BrokerLink implements SignalingChannel {
  readonly connection: BrokerConnection
  private readonly inbox = new EventQueue<IncomingSignalingMessage>()
  private closed = false

  constructor(broker: SignalingBroker) {
    this.connection = broker.accept({
      isOpen: () => !this.closed,
      send: (data, done) => {
        queueMicrotask(() => {
          this.inbox.push(decodeSignalingMessage(data))
          done()
        })
      },
      ping: () => queueMicrotask(() => this.connection.handlePong()),
      close: () => this.markClosed(),
      terminate: () => this.markClosed(),
    })
  }

  send(message: SignalingMessage): void {
    if (this.closed) {
      throw new TransportError(`Cannot send ${message.type}: link closed`)
    }
    const frame = encodeSignalingMessage(message)
    queueMicrotask(() => this.connection.receive(frame))
  }

  receive(timeoutMs: number): Promise<IncomingSignalingMessage> {
    return this.inbox.next(timeoutMs)
  }

  close(): void {
    if (this.closed) return
    this.markClosed()
    this.connection.handleClose()
  }

  private markClosed(): void {
    this.closed = true
    this.inbox.close(new TransportError("Link closed"))
  }
}
