import { createToken } from "@tessera/container"
import type { Logger, LoggerFactory, LoggerProvider } from "@tessera/logger"
import type { RegisteredLogger } from "./registered-logger"

/** The logging-factory singleton every registration entry point adds. */
export const LOGGER_FACTORY = createToken<LoggerFactory>("LoggerFactory")

/** The logger application code injects. Added by the configured registrations. */
export const LOGGER = createToken<Logger>("Logger")

/** Secondary providers. Resolved with `getServices`. */
export const LOGGER_PROVIDER = createToken<LoggerProvider>("LoggerProvider")

export const REGISTERED_LOGGER = createToken<RegisteredLogger>("RegisteredLogger")
