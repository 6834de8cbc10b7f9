import type { Logger } from "@mailstop/logger"
import type { Mock } from "vitest"
import { type MockProxy, mock } from "vitest-mock-extended"
import { createApp } from "../../create-server"
import { resolveOptions } from "../../server-options"
import type { CreateStopperFn, ServerHandle } from "../create-stopper"
import type { ListenFn } from "../listen"
import type { ShutdownFn } from "../shutdown"
import type { SignalHandler } from "../signals"
import {
  type ServerState,
  type StartServerContext,
  StartupError,
  startServer,
} from "../start-server"
import type { StartupFn } from "../startup"

const clean = { ok: true, failures: [], timedOut: false }

describe("startServer", () => {
  let logger: MockProxy<Logger>
  let state: ServerState
  let ready: boolean
  let running: ServerHandle | undefined
  let signalHandler: SignalHandler | undefined

  let onStartup: Mock<StartupFn>
  let onShutdown: Mock<ShutdownFn>
  let listen: Mock<ListenFn>
  let createStopper: Mock<CreateStopperFn>
  let getApp: Mock<() => ReturnType<typeof createApp>>

  const options = resolveOptions({
    port: 8000,
    startupTimeoutMs: 30_000,
    shutdownTimeoutMs: 10_000,
    errorHandling: { kind: "mappings", config: { mappings: {} } },
    routes: () => {},
  })

  beforeEach(() => {
    logger = mock<Logger>()
    state = "idle"
    ready = false
    running = undefined
    signalHandler = undefined

    onStartup = vi.fn<StartupFn>(async () => clean)
    onShutdown = vi.fn<ShutdownFn>(async () => clean)
    listen = vi.fn<ListenFn>(() => ({ close: (cb) => cb?.() }))
    createStopper = vi.fn<CreateStopperFn>((ctx) => ({
      stop: async () => {
        ctx.onStop()
        return clean
      },
      address: { host: ctx.options.host, port: ctx.options.port },
    }))
    getApp = vi.fn(() => createApp())
  })

  function ctx(overrides: Partial<StartServerContext> = {}): StartServerContext {
    return {
      logger,
      now: () => 1_000,
      options,
      getApp,
      getState: () => state,
      setState: (s) => {
        state = s
      },
      setReady: (v) => {
        ready = v
      },
      setRunningServer: (s) => {
        running = s
      },
      getSignalHandler: () => signalHandler,
      collabs: { onStartup, onShutdown, listen, createStopper },
      ...overrides,
    }
  }

  it("refuses to start twice", async () => {
    state = "started"

    await expect(startServer(ctx())).rejects.toThrow("Server already started")
  })

  it("runs start hooks, listens and becomes ready", async () => {
    const handle = await startServer(ctx())

    expect(onStartup).toHaveBeenCalledExactlyOnceWith({
      now: expect.any(Function),
      logger,
      deadlineMs: 31_000,
      startHooks: [],
    })
    expect(onStartup.mock.invocationCallOrder[0]).toBeLessThan(
      listen.mock.invocationCallOrder[0] ?? 0,
    )
    expect(listen).toHaveBeenCalledWith(getApp.mock.results[0]?.value, options, logger)
    expect(handle.address).toStrictEqual({ host: "0.0.0.0", port: 8000 })
    expect(running).toBe(handle)
    expect(state).toBe("started")
    expect(ready).toBe(true)
  })

  it("hands the stopper the shutdown routine and the stop hooks", async () => {
    await startServer(ctx())

    expect(createStopper).toHaveBeenCalledWith(
      expect.objectContaining({
        shutdown: onShutdown,
        stopHooks: options.stopHooks,
        options,
      }),
    )
  })

  it("unregisters the signal handlers once stopped", async () => {
    const unregister = vi.fn()
    signalHandler = { unregister }

    const handle = await startServer(ctx())
    await handle.stop()

    expect(unregister).toHaveBeenCalledOnce()
  })

  it("throws a StartupError carrying the failed hooks", async () => {
    const error = new Error("no credentials")
    onStartup.mockResolvedValue({
      ok: false,
      failures: [{ hook: "provider", error }],
      timedOut: false,
    })

    const started = startServer(ctx())

    await expect(started).rejects.toBeInstanceOf(StartupError)
    await expect(started).rejects.toMatchObject({
      message: "Startup hooks failed",
      failures: [{ hook: "provider", error }],
      timedOut: false,
      cause: error,
    })
    expect(listen).not.toHaveBeenCalled()
    expect(state).toBe("idle")
    expect(ready).toBe(false)
  })

  it("reports a startup timeout", async () => {
    onStartup.mockResolvedValue({ ok: false, failures: [], timedOut: true })

    await expect(startServer(ctx())).rejects.toThrow("Startup timed out")
  })

  it("returns to idle when listening throws", async () => {
    listen.mockImplementation(() => {
      throw new Error("EADDRINUSE")
    })

    await expect(startServer(ctx())).rejects.toThrow("EADDRINUSE")
    expect(state).toBe("idle")
    expect(running).toBeUndefined()
  })
})
