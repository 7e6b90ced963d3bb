import { ServiceCollection } from "@tessera/container"
import { ArgumentNullError } from "@tessera/errors"
import {
  createMemoryDestination,
  globalLogger,
  isRootLogger,
  LoggerConfiguration,
  NullLogger,
  PinoLoggerFactory,
} from "@tessera/logger"
import { RegisteredLogger } from "../registered-logger"
import { LOGGER, LOGGER_FACTORY, LOGGER_PROVIDER, REGISTERED_LOGGER } from "../tokens"
import { useConfiguredLogger, useServiceConfiguredLogger } from "../use-configured-logger"
import { RecordingProvider } from "./recording-provider"

describe("useServiceConfiguredLogger", () => {
  afterEach(async () => {
    await globalLogger.closeAndFlush()
  })

  it("rejects a missing collection", () => {
    expect(() =>
      useServiceConfiguredLogger(undefined as unknown as ServiceCollection, () => {}),
    ).toThrow(ArgumentNullError)
    expect(() =>
      useServiceConfiguredLogger(undefined as unknown as ServiceCollection, () => {}),
    ).toThrow("Value cannot be null or undefined (parameter 'collection')")
  })

  it("rejects a missing callback before registering anything", () => {
    const collection = new ServiceCollection()

    expect(() =>
      useServiceConfiguredLogger(collection, null as unknown as () => void),
    ).toThrow("Value cannot be null or undefined (parameter 'configure')")
    expect(collection.has(LOGGER_FACTORY)).toBe(false)
    expect(collection.has(REGISTERED_LOGGER)).toBe(false)
    expect(collection.has(LOGGER)).toBe(false)
  })

  it("registers the wrapper, the forwarding logger and the factory without building anything", () => {
    const configure = vi.fn()
    const collection = new ServiceCollection()

    const result = useServiceConfiguredLogger(collection, configure)

    expect(result).toBe(collection)
    expect(collection.count(REGISTERED_LOGGER)).toBe(1)
    expect(collection.count(LOGGER)).toBe(1)
    expect(collection.count(LOGGER_FACTORY)).toBe(1)
    expect(configure).not.toHaveBeenCalled()
  })

  it("passes the resolving provider and a fresh configuration to the callback", async () => {
    const configure = vi.fn()
    const provider = useServiceConfiguredLogger(new ServiceCollection(), configure)
      .buildServiceProvider()

    provider.getRequiredService(LOGGER_FACTORY)

    expect(configure).toHaveBeenCalledWith(provider, expect.any(LoggerConfiguration))

    await provider.dispose()
  })

  it("builds the pipeline once per provider", async () => {
    const configure = vi.fn()
    const provider = useServiceConfiguredLogger(new ServiceCollection(), configure)
      .buildServiceProvider()

    const first = provider.getRequiredService(LOGGER_FACTORY)
    const second = provider.getRequiredService(LOGGER_FACTORY)
    provider.getRequiredService(LOGGER)
    provider.getRequiredService(REGISTERED_LOGGER)

    expect(first).toBe(second)
    expect(first).toBeInstanceOf(PinoLoggerFactory)
    expect(configure).toHaveBeenCalledTimes(1)

    await provider.dispose()
  })

  it("the forwarding logger is a distinct object on the same pipeline", async () => {
    const sink = createMemoryDestination()
    const provider = useServiceConfiguredLogger(new ServiceCollection(), (_services, config) => {
      config.writeTo(sink)
    }).buildServiceProvider()

    const registered = provider.getRequiredService(REGISTERED_LOGGER)
    const forwarding = provider.getRequiredService(LOGGER)

    registered.logger.info("from registered")
    forwarding.info("from forwarding")

    expect(registered).toBeInstanceOf(RegisteredLogger)
    expect(forwarding).not.toBe(registered.logger)
    expect(isRootLogger(forwarding)).toBe(false)
    expect(sink.entries.map((e) => e.msg)).toEqual(["from registered", "from forwarding"])

    await registered.logger.dispose()
  })

  it("the container never disposes the root through the wrapper or the forwarding logger", async () => {
    const provider = useServiceConfiguredLogger(new ServiceCollection(), () => {})
      .buildServiceProvider()

    const { logger } = provider.getRequiredService(REGISTERED_LOGGER)
    provider.getRequiredService(LOGGER)

    await provider.dispose()

    expect(logger.isClosed).toBe(false)

    await logger.dispose()
  })

  describe("without preserveGlobalLogger", () => {
    it("installs the root as the global logger when the factory is resolved", async () => {
      const provider = useServiceConfiguredLogger(new ServiceCollection(), () => {})
        .buildServiceProvider()

      const { logger } = provider.getRequiredService(REGISTERED_LOGGER)
      expect(globalLogger.get()).not.toBe(logger)

      provider.getRequiredService(LOGGER_FACTORY)

      expect(globalLogger.get()).toBe(logger)

      await provider.dispose()
    })

    it("disposing the factory closes the root and resets the global logger", async () => {
      const sink = createMemoryDestination()
      const provider = useServiceConfiguredLogger(new ServiceCollection(), (_services, config) => {
        config.writeTo(sink)
      }).buildServiceProvider()

      provider.getRequiredService(LOGGER_FACTORY)
      const previousGlobal = globalLogger.get()
      const { logger } = provider.getRequiredService(REGISTERED_LOGGER)

      await provider.dispose()

      expect(logger.isClosed).toBe(true)
      expect(globalLogger.get()).toBeInstanceOf(NullLogger)
      expect(() => previousGlobal.info("dropped")).not.toThrow()
      expect(sink.entries).toHaveLength(0)
    })
  })

  describe("with preserveGlobalLogger", () => {
    it("leaves the global logger untouched and closes only the root", async () => {
      const installed = new NullLogger()
      globalLogger.set(installed)

      const provider = useServiceConfiguredLogger(new ServiceCollection(), () => {}, {
        preserveGlobalLogger: true,
      }).buildServiceProvider()

      provider.getRequiredService(LOGGER_FACTORY)
      expect(globalLogger.get()).toBe(installed)

      const { logger } = provider.getRequiredService(REGISTERED_LOGGER)
      await provider.dispose()

      expect(logger.isClosed).toBe(true)
      expect(globalLogger.get()).toBe(installed)
    })

    it("creates category loggers from the root", async () => {
      const sink = createMemoryDestination()
      const provider = useServiceConfiguredLogger(
        new ServiceCollection(),
        (_services, config) => {
          config.writeTo(sink)
        },
        { preserveGlobalLogger: true },
      ).buildServiceProvider()

      provider.getRequiredService(LOGGER_FACTORY).createLogger("Billing").info("charged")

      expect(sink.entries).toHaveLength(1)
      expect(sink.entries[0]).toMatchObject({ category: "Billing", msg: "charged" })

      await provider.dispose()
    })
  })

  describe("writeToProviders", () => {
    it("forwards every event to each registered provider", async () => {
      const first = new RecordingProvider()
      const second = new RecordingProvider()
      const collection = new ServiceCollection()
        .addInstance(LOGGER_PROVIDER, first)
        .addInstance(LOGGER_PROVIDER, second)

      const provider = useServiceConfiguredLogger(collection, () => {}, {
        writeToProviders: true,
      }).buildServiceProvider()

      const logger = provider.getRequiredService(LOGGER_FACTORY).createLogger("Orders")
      logger.info("one")
      logger.info("two")

      for (const recorder of [first, second]) {
        expect(recorder.events.map((e) => e.message)).toEqual(["one", "two"])
        expect(recorder.events[0]?.category).toBe("Orders")
      }

      await provider.dispose()
    })

    it("forwards nothing when not requested", async () => {
      const recorder = new RecordingProvider()
      const collection = new ServiceCollection().addInstance(LOGGER_PROVIDER, recorder)

      const provider = useServiceConfiguredLogger(collection, () => {}).buildServiceProvider()

      provider.getRequiredService(LOGGER_FACTORY).createLogger("Orders").info("one")

      expect(recorder.events).toEqual([])

      await provider.dispose()
    })

    it("disposes a container-built provider exactly once", async () => {
      const recorder = Object.assign(new RecordingProvider(), { dispose: vi.fn() })
      const collection = new ServiceCollection().addSingleton(LOGGER_PROVIDER, () => recorder)

      const provider = useServiceConfiguredLogger(collection, () => {}, {
        writeToProviders: true,
      }).buildServiceProvider()

      provider.getRequiredService(LOGGER_FACTORY)
      await provider.dispose()

      expect(recorder.dispose).toHaveBeenCalledTimes(1)
    })

    it("disposes providers added through the factory with the pipeline", async () => {
      const late = Object.assign(new RecordingProvider(), { dispose: vi.fn() })
      const provider = useServiceConfiguredLogger(new ServiceCollection(), () => {}, {
        writeToProviders: true,
      }).buildServiceProvider()

      provider.getRequiredService(LOGGER_FACTORY).addProvider(late)
      const { logger } = provider.getRequiredService(REGISTERED_LOGGER)
      await provider.dispose()

      expect(logger.isClosed).toBe(true)
      expect(late.dispose).toHaveBeenCalledTimes(1)
    })

    it("providers added through the factory receive later events", async () => {
      const late = new RecordingProvider()
      const provider = useServiceConfiguredLogger(new ServiceCollection(), () => {}, {
        writeToProviders: true,
      }).buildServiceProvider()

      const factory = provider.getRequiredService(LOGGER_FACTORY)
      factory.createLogger("Orders").info("before")
      factory.addProvider(late)
      factory.createLogger("Orders").info("after")

      expect(late.events.map((e) => e.message)).toEqual(["after"])

      await provider.dispose()
    })
  })

  it("renders message templates end to end", async () => {
    const sink = createMemoryDestination()
    const provider = useServiceConfiguredLogger(new ServiceCollection(), (_services, config) => {
      config.writeTo(sink)
    }).buildServiceProvider()

    const logger = provider.getRequiredService(LOGGER_FACTORY).createLogger("Orders")
    logger.info("Processed order {orderId}", { orderId: 42 })

    expect(sink.entries).toHaveLength(1)
    expect(sink.entries[0]).toMatchObject({
      level: 30,
      category: "Orders",
      msg: "Processed order 42",
      orderId: 42,
    })

    await provider.dispose()
  })
})

describe("useConfiguredLogger", () => {
  afterEach(async () => {
    await globalLogger.closeAndFlush()
  })

  it("rejects a missing collection", () => {
    expect(() =>
      useConfiguredLogger(undefined as unknown as ServiceCollection, () => {}),
    ).toThrow("Value cannot be null or undefined (parameter 'collection')")
  })

  it("rejects a missing callback before registering anything", () => {
    const collection = new ServiceCollection()

    expect(() => useConfiguredLogger(collection, undefined as unknown as () => void)).toThrow(
      ArgumentNullError,
    )
    expect(collection.has(LOGGER_FACTORY)).toBe(false)
  })

  it("hands the callback only the configuration", async () => {
    const sink = createMemoryDestination()
    const configure = vi.fn((config: LoggerConfiguration) => {
      config.minimumLevel("debug").writeTo(sink)
    })

    const provider = useConfiguredLogger(new ServiceCollection(), configure, {
      preserveGlobalLogger: true,
    }).buildServiceProvider()

    provider.getRequiredService(LOGGER).debug("visible")

    expect(configure).toHaveBeenCalledTimes(1)
    expect(configure.mock.calls[0]).toHaveLength(1)
    expect(sink.entries.map((e) => e.msg)).toEqual(["visible"])

    await provider.getRequiredService(REGISTERED_LOGGER).logger.dispose()
  })
})
