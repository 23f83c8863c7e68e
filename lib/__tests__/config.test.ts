import { describe, expect, it } from "vitest"
import { DEFAULT_SIGNALING_PORT, loadConfig } from "../config"

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: DEFAULT_SIGNALING_PORT,
      host: "0.0.0.0",
      signalingUrl: "ws://localhost:37851/ws",
      ice: {},
      debug: false,
    })
  })

  it("prefers SIGNALING_PORT over PORT", () => {
    expect(loadConfig({ SIGNALING_PORT: "9000", PORT: "8080" }).port).toBe(9000)
    expect(loadConfig({ PORT: "8080" }).port).toBe(8080)
    expect(loadConfig({ PORT: "8080" }).signalingUrl).toBe("ws://localhost:8080/ws")
  })

  it("rejects ports that are not ports", () => {
    expect(() => loadConfig({ PORT: "eighty" })).toThrow('PORT must be a port number between 1 and 65535, got "eighty"')
    expect(() => loadConfig({ SIGNALING_PORT: "70000" })).toThrow("SIGNALING_PORT must be a port number")
    expect(() => loadConfig({ SIGNALING_PORT: "0" })).toThrow("SIGNALING_PORT must be a port number")
  })

  it("selects the manual exchange", () => {
    expect(loadConfig({ SIGNALING_URL: "manual" }).signalingUrl).toBeNull()
    expect(loadConfig({ SIGNALING_URL: "MANUAL" }).signalingUrl).toBeNull()
  })

  it("passes through a signaling URL and ICE settings", () => {
    const config = loadConfig({
      SIGNALING_URL: "wss://signal.example.test/ws",
      STUN_SERVER: "stun.example.test:3478",
      TURN_SERVER: " ",
      TURN_USERNAME: "user",
      TURN_CREDENTIAL: "test-secret",
      DEBUG: "true",
    })

    expect(config.signalingUrl).toBe("wss://signal.example.test/ws")
    expect(config.ice).toEqual({
      stunServer: "stun.example.test:3478",
      turnServer: undefined,
      turnUsername: "user",
      turnCredential: "test-secret",
    })
    expect(config.debug).toBe(true)
  })
})
