import { vi } from "vitest"

// Broker and negotiator narrate every step on stdout
vi.spyOn(console, "log").mockImplementation(() => undefined)
vi.spyOn(console, "info").mockImplementation(() => undefined)
