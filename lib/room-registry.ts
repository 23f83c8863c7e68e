import { ProtocolError } from "./errors"

export class Room<M> {
  readonly id: string
  readonly createdAt = new Date()
  private readonly members = new Set<M>()

  constructor(id: string) {
    this.id = id
  }

  get size(): number {
    return this.members.size
  }

  has(member: M): boolean {
    return this.members.has(member)
  }

  add(member: M): void {
    this.members.add(member)
  }

  /** Returns how many members are left. */
  remove(member: M): number {
    this.members.delete(member)
    return this.members.size
  }

  /** Snapshot of everyone except `member`, safe to iterate while members leave. */
  others(member: M): M[] {
    return Array.from(this.members).filter((candidate) => candidate !== member)
  }
}

/**
 * Rooms keyed by their caller-chosen id. Every operation is synchronous, so
 * each one runs to completion on the event loop before any other connection
 * can observe the registry.
 */
export class RoomRegistry<M> {
  private readonly rooms = new Map<string, Room<M>>()

  get size(): number {
    return this.rooms.size
  }

  createRoom(id: string): Room<M> {
    if (this.rooms.has(id)) {
      throw new ProtocolError("DuplicateRoom", `Room ${id} already exists`)
    }
    const room = new Room<M>(id)
    this.rooms.set(id, room)
    return room
  }

  getRoom(id: string): Room<M> | undefined {
    return this.rooms.get(id)
  }

  /** Removes the room only if `expected` is still the one registered under its id. */
  removeRoom(id: string, expected?: Room<M>): boolean {
    const room = this.rooms.get(id)
    if (!room || (expected && room !== expected)) return false
    this.rooms.delete(id)
    return true
  }

  roomIds(): string[] {
    return Array.from(this.rooms.keys())
  }
}
