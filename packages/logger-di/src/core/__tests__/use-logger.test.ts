import { ServiceCollection } from "@tessera/container"
import { ArgumentNullError } from "@tessera/errors"
import {
  createMemoryDestination,
  globalLogger,
  LoggerConfiguration,
  LoggerProviderCollection,
  NullLogger,
  PinoRootLogger,
} from "@tessera/logger"
import { LOGGER_FACTORY, LOGGER_PROVIDER } from "../tokens"
import { useLogger } from "../use-logger"
import { RecordingProvider } from "./recording-provider"

describe("useLogger", () => {
  afterEach(async () => {
    await globalLogger.closeAndFlush()
  })

  it("rejects a missing collection", () => {
    expect(() => useLogger(null as unknown as ServiceCollection)).toThrow(ArgumentNullError)
  })

  it("registers a factory singleton and returns the collection", () => {
    const collection = new ServiceCollection()

    expect(useLogger(collection)).toBe(collection)
    expect(collection.count(LOGGER_FACTORY)).toBe(1)
  })

  it("creates category loggers from the supplied logger", async () => {
    const sink = createMemoryDestination()
    const logger = new PinoRootLogger({ destination: sink })
    const provider = useLogger(new ServiceCollection(), { logger }).buildServiceProvider()

    provider.getRequiredService(LOGGER_FACTORY).createLogger("Orders").info("placed")

    expect(sink.entries[0]).toMatchObject({ category: "Orders", msg: "placed" })

    await provider.dispose()
  })

  it("falls back to the global logger when none is supplied", async () => {
    const sink = createMemoryDestination()
    globalLogger.set(new PinoRootLogger({ destination: sink }))

    const provider = useLogger(new ServiceCollection()).buildServiceProvider()

    provider.getRequiredService(LOGGER_FACTORY).createLogger("Orders").info("placed")

    expect(sink.entries.map((e) => e.msg)).toEqual(["placed"])

    await provider.dispose()
  })

  it("last registration wins", async () => {
    const first = createMemoryDestination()
    const second = createMemoryDestination()
    const collection = new ServiceCollection()

    useLogger(collection, { logger: new PinoRootLogger({ destination: first }) })
    useLogger(collection, { logger: new PinoRootLogger({ destination: second }) })

    const provider = collection.buildServiceProvider()
    provider.getRequiredService(LOGGER_FACTORY).createLogger("Orders").info("placed")

    expect(first.entries).toHaveLength(0)
    expect(second.entries).toHaveLength(1)

    await provider.dispose()
  })

  describe("disposal", () => {
    it("leaves the supplied logger open by default", async () => {
      const logger = new PinoRootLogger({ destination: createMemoryDestination() })
      const provider = useLogger(new ServiceCollection(), { logger }).buildServiceProvider()

      provider.getRequiredService(LOGGER_FACTORY)
      await provider.dispose()

      expect(logger.isClosed).toBe(false)
    })

    it("closes the supplied logger when asked to", async () => {
      const logger = new PinoRootLogger({ destination: createMemoryDestination() })
      const provider = useLogger(new ServiceCollection(), { logger, dispose: true })
        .buildServiceProvider()

      provider.getRequiredService(LOGGER_FACTORY)
      await provider.dispose()

      expect(logger.isClosed).toBe(true)
    })

    it("closes and resets the global logger when asked to without a logger", async () => {
      const installed = new PinoRootLogger({ destination: createMemoryDestination() })
      globalLogger.set(installed)

      const provider = useLogger(new ServiceCollection(), { dispose: true }).buildServiceProvider()

      provider.getRequiredService(LOGGER_FACTORY)
      await provider.dispose()

      expect(installed.isClosed).toBe(true)
      expect(globalLogger.get()).toBeInstanceOf(NullLogger)
    })
  })

  describe("providers", () => {
    it("adds every registered provider to the supplied collection", async () => {
      const providers = new LoggerProviderCollection()
      const recorder = new RecordingProvider()
      const logger = new LoggerConfiguration().writeToProviders(providers).createLogger()

      const collection = new ServiceCollection().addInstance(LOGGER_PROVIDER, recorder)
      const provider = useLogger(collection, { logger, dispose: true, providers })
        .buildServiceProvider()

      provider.getRequiredService(LOGGER_FACTORY).createLogger("Orders").info("placed")

      expect(providers.size).toBe(1)
      expect(recorder.events).toEqual([
        { category: "Orders", message: "placed", meta: {} },
      ])

      await provider.dispose()
    })

    it("ignores registered providers without a collection", async () => {
      const recorder = new RecordingProvider()
      const collection = new ServiceCollection().addInstance(LOGGER_PROVIDER, recorder)

      const provider = useLogger(collection).buildServiceProvider()
      provider.getRequiredService(LOGGER_FACTORY).createLogger("Orders").info("placed")

      expect(recorder.events).toEqual([])

      await provider.dispose()
    })
  })
})
