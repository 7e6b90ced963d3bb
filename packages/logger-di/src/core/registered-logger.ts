import type { RootLogger } from "@tessera/logger"

/**
 * Holds the root logger built by a configured registration.
 *
 * The container disposes any singleton with a `dispose` method. This
 * wrapper has none, so the container never closes the root through it;
 * the logging factory is the root's only owner.
 */
export class RegisteredLogger {
  constructor(readonly logger: RootLogger) {}
}
