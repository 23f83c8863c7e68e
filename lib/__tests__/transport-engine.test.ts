import { describe, expect, it } from "vitest"
import {
  BufferedChannel,
  DescriptionFormatError,
  decodeSessionDescription,
  encodeSessionDescription,
  isConnectedState,
  isFailedState,
  type ChannelData,
} from "../transport-engine"
import { LoopbackChannel } from "./helpers/loopback-transport"

describe("session description envelope", () => {
  it("wraps the description as base64 JSON", () => {
    const blob = encodeSessionDescription({ type: "offer", sdp: "v=0" })

    expect(Buffer.from(blob, "base64").toString("utf8")).toBe('{"type":"offer","sdp":"v=0"}')
    expect(decodeSessionDescription(blob, "offer")).toEqual({ type: "offer", sdp: "v=0" })
  })

  it("refuses the wrong kind of description", () => {
    const blob = encodeSessionDescription({ type: "offer", sdp: "v=0" })

    expect(() => decodeSessionDescription(blob, "answer")).toThrow(DescriptionFormatError)
    expect(() => decodeSessionDescription(blob, "answer")).toThrow(
      "Invalid session description: expected an answer, got offer",
    )
  })

  it("refuses blobs that are not descriptions", () => {
    expect(() => decodeSessionDescription("!!!", "offer")).toThrow(
      "Invalid session description: the description is not base64-encoded JSON",
    )
    const noSdp = Buffer.from('{"type":"offer"}').toString("base64")
    expect(() => decodeSessionDescription(noSdp, "offer")).toThrow("Invalid session description: the description has no sdp")
  })
})

describe("connection states", () => {
  it("sorts states into connected and failed", () => {
    expect(isConnectedState("completed")).toBe(true)
    expect(isConnectedState("checking")).toBe(false)
    expect(isFailedState("disconnected")).toBe(true)
    expect(isFailedState("new")).toBe(false)
  })
})

describe("BufferedChannel", () => {
  function openChannel() {
    const raw = new LoopbackChannel("file-transfer")
    const peer = new LoopbackChannel("file-transfer")
    raw.peer = peer
    peer.peer = raw
    raw.markOpen()
    peer.markOpen()
    return { raw, peer, channel: new BufferedChannel(raw) }
  }

  it("replays messages that arrived before the handler", async () => {
    const { peer, channel } = openChannel()
    peer.send("one")
    peer.send(Buffer.from("two"))
    await new Promise<void>((resolve) => setImmediate(resolve))

    const seen: ChannelData[] = []
    channel.setMessageHandler((data) => seen.push(data))
    peer.send("three")
    await new Promise<void>((resolve) => setImmediate(resolve))

    expect(seen.map((data) => (typeof data === "string" ? data : Buffer.from(data).toString()))).toEqual(["one", "two", "three"])
  })

  it("runs a close handler at once when already closed", () => {
    const { raw, channel } = openChannel()
    raw.close()

    let calls = 0
    channel.onClosed(() => calls++)

    expect(calls).toBe(1)
    expect(channel.isOpen()).toBe(false)
    expect(() => channel.send("late")).toThrow("Data channel is not open")
  })
})
