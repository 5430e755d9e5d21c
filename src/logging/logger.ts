import pino, { type Logger } from "pino"

import { buildLoggerOptions, resolveRuntimeEnv, type RuntimeEnv } from "./options.js"

type CreateLoggerInput = {
  env?: RuntimeEnv
  logLevel?: string
  serviceName?: string
  verbose?: boolean
  prettyLogs?: boolean
}

/**
 * Creates the process logger from one policy surface. Records always go to stderr so the
 * status report on stdout stays clean when piped.
 *
 * @param input Optional logger overrides for embedding and tests.
 * @returns Configured Pino logger.
 */
export const createLogger = (input: CreateLoggerInput = {}): Logger => {
  const env = input.env ?? resolveRuntimeEnv()
  const prettyLogs = input.prettyLogs ?? process.env.ENDPOINT_STATUS_PRETTY_LOGS !== "0"
  const options = buildLoggerOptions({
    env,
    logLevel: input.logLevel,
    serviceName: input.serviceName,
    verbose: input.verbose,
    prettyLogs,
  })

  if (options.transport) {
    return pino(options)
  }

  return pino(options, pino.destination(2))
}

/**
 * Uses child loggers so every record names the component that produced it.
 *
 * @param component Logical component name attached to each record.
 * @param parent Parent logger used to inherit base runtime fields.
 * @returns Component-scoped logger.
 */
export const createComponentLogger = (component: string, parent: Logger): Logger => {
  return parent.child({ component })
}
