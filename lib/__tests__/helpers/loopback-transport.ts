import type {
  ChannelData,
  ConnectionState,
  DataChannel,
  IceServer,
  SessionDescription,
  TransportEngine,
  TransportFactory,
} from "../../transport-engine"

export interface LoopbackOptions {
  /** never report gathering complete */
  stallGathering?: boolean
  /** report `failed` instead of `connected` */
  failConnectivity?: boolean
  /** never leave `checking` */
  stallConnectivity?: boolean
}

function byteLength(data: ChannelData): number {
  return typeof data === "string" ? Buffer.byteLength(data) : data.length
}

export class LoopbackChannel implements DataChannel {
  peer: LoopbackChannel | null = null
  bufferedAmount = 0
  readonly sent: ChannelData[] = []
  private open = false
  private closed = false
  private readonly openHandlers: Array<() => void> = []
  private readonly messageHandlers: Array<(data: ChannelData) => void> = []
  private readonly closeHandlers: Array<() => void> = []

  constructor(readonly label: string) {}

  isOpen(): boolean {
    return this.open && !this.closed
  }

  send(data: ChannelData): void {
    if (!this.isOpen()) throw new Error(`Channel ${this.label} is not open`)

    const copy = typeof data === "string" ? data : Uint8Array.from(data)
    const size = byteLength(copy)
    this.sent.push(copy)
    this.bufferedAmount += size

    const peer = this.peer
    setImmediate(() => {
      this.bufferedAmount -= size
      peer?.deliver(copy)
    })
  }

  close(): void {
    if (this.closed) return
    this.markClosed()
    const peer = this.peer
    setImmediate(() => peer?.markClosed())
  }

  onOpen(handler: () => void): void {
    this.openHandlers.push(handler)
  }

  onMessage(handler: (data: ChannelData) => void): void {
    this.messageHandlers.push(handler)
  }

  onClosed(handler: () => void): void {
    this.closeHandlers.push(handler)
  }

  markOpen(): void {
    if (this.closed) return
    this.open = true
    for (const handler of this.openHandlers) handler()
  }

  markClosed(): void {
    if (this.closed) return
    this.closed = true
    this.open = false
    for (const handler of this.closeHandlers) handler()
  }

  private deliver(data: ChannelData): void {
    if (this.closed) return
    for (const handler of this.messageHandlers) handler(data)
  }
}

/**
 * In-process peer connection. Peers find each other through the sdp text
 * `loopback <id>`; applying the answer on the offering side connects both.
 */
export class LoopbackEngine implements TransportEngine {
  readonly channels: LoopbackChannel[] = []
  closed = false
  private local: SessionDescription | null = null
  private remote: LoopbackEngine | null = null
  private readonly gatheringHandlers: Array<() => void> = []
  private readonly stateHandlers: Array<(state: ConnectionState) => void> = []
  private readonly channelHandlers: Array<(channel: DataChannel) => void> = []

  constructor(
    readonly id: string,
    readonly iceServers: IceServer[],
    private readonly network: LoopbackNetwork,
    private readonly options: LoopbackOptions,
  ) {}

  async createOffer(): Promise<SessionDescription> {
    return { type: "offer", sdp: `loopback ${this.id}` }
  }

  async createAnswer(): Promise<SessionDescription> {
    if (!this.remote) throw new Error("No remote offer applied")
    return { type: "answer", sdp: `loopback ${this.id}` }
  }

  async setLocalDescription(description: SessionDescription): Promise<void> {
    this.local = description
    if (this.options.stallGathering) return
    setImmediate(() => {
      for (const handler of this.gatheringHandlers) handler()
    })
  }

  async setRemoteDescription(description: SessionDescription): Promise<void> {
    const match = /^loopback (\S+)$/.exec(description.sdp)
    const peer = match ? this.network.find(match[1]) : undefined
    if (!peer) throw new Error(`Unknown peer in description: ${description.sdp}`)
    this.remote = peer

    if (description.type === "answer") {
      setImmediate(() => this.connect(peer))
    }
  }

  localDescription(): SessionDescription | null {
    return this.local
  }

  createDataChannel(label: string): DataChannel {
    const channel = new LoopbackChannel(label)
    this.channels.push(channel)
    return channel
  }

  onIceGatheringComplete(handler: () => void): void {
    this.gatheringHandlers.push(handler)
  }

  onConnectionStateChange(handler: (state: ConnectionState) => void): void {
    this.stateHandlers.push(handler)
  }

  onDataChannel(handler: (channel: DataChannel) => void): void {
    this.channelHandlers.push(handler)
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    for (const channel of this.channels) channel.close()
  }

  emitState(state: ConnectionState): void {
    if (this.closed) return
    for (const handler of this.stateHandlers) handler(state)
  }

  private connect(peer: LoopbackEngine): void {
    if (this.closed || peer.closed) return

    this.emitState("checking")
    peer.emitState("checking")
    if (this.options.stallConnectivity) return

    if (this.options.failConnectivity) {
      this.emitState("failed")
      peer.emitState("failed")
      return
    }

    this.emitState("connected")
    peer.emitState("connected")

    for (const channel of this.channels) {
      const remote = new LoopbackChannel(channel.label)
      channel.peer = remote
      remote.peer = channel
      peer.channels.push(remote)
      for (const handler of peer.channelHandlers) handler(remote)
      channel.markOpen()
      remote.markOpen()
    }
  }
}

export class LoopbackNetwork {
  readonly engines: LoopbackEngine[] = []
  private counter = 0

  constructor(private readonly options: LoopbackOptions = {}) {}

  readonly factory: TransportFactory = (iceServers) => {
    const engine = new LoopbackEngine(`peer-${++this.counter}`, iceServers, this, this.options)
    this.engines.push(engine)
    return engine
  }

  find(id: string): LoopbackEngine | undefined {
    return this.engines.find((engine) => engine.id === id)
  }
}
