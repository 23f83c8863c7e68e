// Room-based signaling broker - relays session descriptions between the two members of a room
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http"
import { WebSocket, WebSocketServer } from "ws"
import { ProtocolError } from "./errors"
import { RoomRegistry, type Room } from "./room-registry"
import {
  decodeSignalingMessage,
  encodeSignalingMessage,
  rawDataToString,
  SIGNALING_PATH,
  type ClientRole,
  type IncomingSignalingMessage,
  type SignalingMessage,
} from "./signaling-types"

export const PING_INTERVAL_MS = 54 * 1000
export const READ_TIMEOUT_MS = 60 * 1000
export const MAX_QUEUED_MESSAGES = 256
export const MAX_ROOM_MEMBERS = 2

/** The slice of a WebSocket the broker drives. */
export interface SignalingSocket {
  isOpen(): boolean
  send(data: string, done: (error?: Error) => void): void
  ping(): void
  close(): void
  terminate(): void
}

export interface BrokerOptions {
  registry?: RoomRegistry<BrokerConnection>
  pingIntervalMs?: number
  readTimeoutMs?: number
  maxQueuedMessages?: number
}

let connectionCounter = 0

/**
 * One live member connection. Outbound messages are counted from enqueue
 * until the socket reports them written; a connection that lets more than
 * `maxQueuedMessages` pile up is treated as dead.
 */
export class BrokerConnection {
  readonly id = `conn-${++connectionCounter}`
  private currentRoom: Room<BrokerConnection> | null = null
  private assignedRole: ClientRole | null = null
  private inFlight = 0
  private closed = false
  private pingTimer: NodeJS.Timeout | null = null
  private readTimer: NodeJS.Timeout | null = null

  constructor(
    private readonly socket: SignalingSocket,
    private readonly broker: SignalingBroker,
    private readonly limits: Required<Omit<BrokerOptions, "registry">>,
  ) {
    this.pingTimer = setInterval(() => this.keepAlive(), limits.pingIntervalMs)
    this.refreshDeadline()
  }

  get room(): Room<BrokerConnection> | null {
    return this.currentRoom
  }

  get role(): ClientRole | null {
    return this.assignedRole
  }

  get isClosed(): boolean {
    return this.closed
  }

  get queuedMessages(): number {
    return this.inFlight
  }

  /** Binds the connection to a room. The role never changes afterwards. */
  join(room: Room<BrokerConnection>, role: ClientRole): void {
    this.currentRoom = room
    this.assignedRole = role
    room.add(this)
  }

  detach(): Room<BrokerConnection> | null {
    const room = this.currentRoom
    this.currentRoom = null
    return room
  }

  receive(frame: string): void {
    if (this.closed) return
    this.refreshDeadline()
    this.broker.dispatch(this, frame)
  }

  handlePong(): void {
    if (this.closed) return
    this.refreshDeadline()
  }

  handleClose(): void {
    this.shutdown("socket closed")
  }

  /** Never blocks: a full queue closes the connection and reports false. */
  enqueue(message: SignalingMessage): boolean {
    if (this.closed || !this.socket.isOpen()) return false

    if (this.inFlight >= this.limits.maxQueuedMessages) {
      console.warn(`⚠️ Outbound queue full for ${this.id} (${this.inFlight} messages), dropping connection`)
      this.shutdown("outbound queue overflow")
      return false
    }

    this.inFlight++
    this.socket.send(encodeSignalingMessage(message), (error) => {
      this.inFlight = Math.max(0, this.inFlight - 1)
      if (error) {
        console.error(`❌ Write to ${this.id} failed:`, error.message)
        this.shutdown("write failed")
      }
    })
    return true
  }

  /** Idempotent. A graceful shutdown sends a close frame, otherwise the socket is dropped. */
  shutdown(reason: string, graceful = false): void {
    if (this.closed) return
    this.closed = true

    if (this.pingTimer) clearInterval(this.pingTimer)
    if (this.readTimer) clearTimeout(this.readTimer)
    this.pingTimer = null
    this.readTimer = null

    console.log(`🔌 ${this.id} disconnected (${reason})`)
    this.broker.leave(this)
    if (graceful) {
      this.socket.close()
    } else {
      this.socket.terminate()
    }
  }

  private keepAlive(): void {
    if (this.closed) return
    if (!this.socket.isOpen()) {
      this.shutdown("socket no longer open")
      return
    }
    this.socket.ping()
  }

  private refreshDeadline(): void {
    if (this.readTimer) clearTimeout(this.readTimer)
    this.readTimer = setTimeout(() => this.shutdown("read deadline exceeded"), this.limits.readTimeoutMs)
  }
}

export class SignalingBroker {
  readonly registry: RoomRegistry<BrokerConnection>
  private readonly connections = new Set<BrokerConnection>()
  private readonly limits: Required<Omit<BrokerOptions, "registry">>
  private server: Server | null = null
  private wss: WebSocketServer | null = null
  private readonly startedAt = Date.now()

  constructor(options: BrokerOptions = {}) {
    this.registry = options.registry ?? new RoomRegistry<BrokerConnection>()
    this.limits = {
      pingIntervalMs: options.pingIntervalMs ?? PING_INTERVAL_MS,
      readTimeoutMs: options.readTimeoutMs ?? READ_TIMEOUT_MS,
      maxQueuedMessages: options.maxQueuedMessages ?? MAX_QUEUED_MESSAGES,
    }
  }

  get connectionCount(): number {
    return this.connections.size
  }

  /** The listener, once `listen` has bound it. */
  get httpServer(): Server | null {
    return this.server
  }

  accept(socket: SignalingSocket): BrokerConnection {
    const connection = new BrokerConnection(socket, this, this.limits)
    this.connections.add(connection)
    console.log(`🔗 ${connection.id} connected (${this.connections.size} open)`)
    return connection
  }

  attachWebSocket(ws: WebSocket): BrokerConnection {
    const connection = this.accept({
      isOpen: () => ws.readyState === WebSocket.OPEN,
      send: (data, done) => ws.send(data, done),
      ping: () => ws.ping(),
      close: () => ws.close(),
      terminate: () => ws.terminate(),
    })

    ws.on("message", (data) => connection.receive(rawDataToString(data)))
    ws.on("pong", () => connection.handlePong())
    ws.on("close", () => connection.handleClose())
    ws.on("error", (error) => {
      console.error(`❌ WebSocket error on ${connection.id}:`, error.message)
      connection.shutdown("socket error")
    })
    return connection
  }

  dispatch(connection: BrokerConnection, frame: string): void {
    try {
      const message = decodeSignalingMessage(frame)
      console.log(`📨 ${message.type || "(no type)"} from ${connection.id}`)

      switch (message.type) {
        case "create_room":
          this.handleCreateRoom(connection, message)
          break
        case "join_room":
          this.handleJoinRoom(connection, message)
          break
        case "offer":
          this.relayDescription(connection, message, "sender")
          break
        case "answer":
          this.relayDescription(connection, message, "receiver")
          break
        default:
          throw new ProtocolError("UnknownType", `Unknown message type: ${message.type}`)
      }
    } catch (error) {
      if (!(error instanceof ProtocolError)) throw error
      console.warn(`⚠️ Rejected request from ${connection.id}: ${error.message}`)
      connection.enqueue({ type: "error", error: error.message })
    }
  }

  /** Removes the connection from its room, dropping the room once it is empty. */
  leave(connection: BrokerConnection): void {
    this.connections.delete(connection)

    const room = connection.detach()
    if (!room) return

    const remaining = room.remove(connection)
    console.log(`👋 ${connection.id} left room ${room.id} (${remaining} remaining)`)

    if (remaining === 0) {
      this.registry.removeRoom(room.id, room)
      console.log(`🧹 Room ${room.id} removed (empty)`)
      return
    }
    this.broadcast(room, connection, { type: "peer_left", room_id: room.id })
  }

  async listen(port: number, host = "0.0.0.0"): Promise<number> {
    const server = createServer((req, res) => this.handleHttp(req, res))
    const wss = new WebSocketServer({ server, path: SIGNALING_PATH })

    wss.on("connection", (ws) => this.attachWebSocket(ws))
    wss.on("error", (error) => {
      console.error("❌ WebSocket server error:", error.message)
    })

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject)
      server.listen(port, host, () => {
        server.off("error", reject)
        resolve()
      })
    })

    this.server = server
    this.wss = wss

    const address = server.address()
    const boundPort = typeof address === "object" && address ? address.port : port
    console.log(`✅ Signaling broker listening on port ${boundPort}`)
    console.log(`🔗 WebSocket endpoint: ws://localhost:${boundPort}${SIGNALING_PATH}`)
    return boundPort
  }

  async close(): Promise<void> {
    for (const connection of Array.from(this.connections)) {
      connection.shutdown("broker shutting down", true)
    }

    const wss = this.wss
    const server = this.server
    this.wss = null
    this.server = null

    if (wss) {
      await new Promise<void>((resolve) => wss.close(() => resolve()))
    }
    if (server) {
      await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())))
    }
  }

  private handleCreateRoom(connection: BrokerConnection, message: IncomingSignalingMessage): void {
    const roomId = this.requireRoomId(message)
    this.requireNoRoom(connection)

    if (this.registry.getRoom(roomId)) {
      throw new ProtocolError("RoomExists", `Room ${roomId} already exists`)
    }

    const room = this.registry.createRoom(roomId)
    connection.join(room, "sender")
    console.log(`🆕 Room ${roomId} created by ${connection.id} [SENDER]`)

    connection.enqueue({ type: "room_created", room_id: roomId })
  }

  private handleJoinRoom(connection: BrokerConnection, message: IncomingSignalingMessage): void {
    const roomId = this.requireRoomId(message)
    this.requireNoRoom(connection)

    const room = this.registry.getRoom(roomId)
    if (!room) {
      throw new ProtocolError("RoomNotFound", `Room ${roomId} not found`)
    }
    if (room.size >= MAX_ROOM_MEMBERS) {
      throw new ProtocolError("RoomFull", `Room ${roomId} is full (maximum ${MAX_ROOM_MEMBERS} members)`)
    }

    connection.join(room, "receiver")
    console.log(`✅ ${connection.id} joined room ${roomId} (${room.size}/${MAX_ROOM_MEMBERS}) [RECEIVER]`)

    connection.enqueue({ type: "room_joined", room_id: roomId })
    this.broadcast(room, connection, { type: "peer_joined", room_id: roomId })
  }

  private relayDescription(connection: BrokerConnection, message: IncomingSignalingMessage, requiredRole: ClientRole): void {
    const room = connection.room
    if (!room) {
      throw new ProtocolError("NotInRoom", "Not in a room")
    }
    if (connection.role !== requiredRole) {
      throw new ProtocolError("WrongRole", `Only the ${requiredRole} may send ${message.type}`)
    }

    const type = requiredRole === "sender" ? "offer" : "answer"
    const delivered = this.broadcast(room, connection, {
      type,
      room_id: room.id,
      file_id: message.file_id,
      sdp: message.sdp,
    })
    console.log(`🔄 Relayed ${type} in room ${room.id} to ${delivered} member(s)`)
  }

  /** Sends to every member except `exclude`. Returns how many accepted it. */
  private broadcast(room: Room<BrokerConnection>, exclude: BrokerConnection, message: SignalingMessage): number {
    let delivered = 0
    for (const member of room.others(exclude)) {
      if (member.enqueue(message)) delivered++
    }
    return delivered
  }

  private requireRoomId(message: IncomingSignalingMessage): string {
    const roomId = message.room_id ?? ""
    if (!roomId) {
      throw new ProtocolError("InvalidRoomId", "Room ID must not be empty")
    }
    return roomId
  }

  private requireNoRoom(connection: BrokerConnection): void {
    if (connection.room) {
      throw new ProtocolError("AlreadyInRoom", `Already in room ${connection.room.id}`)
    }
  }

  private handleHttp(req: IncomingMessage, res: ServerResponse): void {
    if (req.url === "/health") {
      res.writeHead(200, { "Content-Type": "application/json" })
      res.end(
        JSON.stringify({
          status: "ok",
          rooms: this.registry.size,
          connections: this.connections.size,
          uptime: Math.round((Date.now() - this.startedAt) / 1000),
        }),
      )
      return
    }

    if (req.url === "/") {
      res.writeHead(200, { "Content-Type": "text/plain; charset=utf-8" })
      res.end("Signaling broker is running\n")
      return
    }

    res.writeHead(404)
    res.end()
  }
}
