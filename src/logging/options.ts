import pino, { type LoggerOptions, type TransportSingleOptions } from "pino"

export type RuntimeEnv = "development" | "test" | "production"

type BuildLoggerOptionsInput = {
  env?: RuntimeEnv
  logLevel?: string
  serviceName?: string
  verbose?: boolean
  prettyLogs?: boolean
}

const STDERR_FD = 2

const PRETTY_TRANSPORT: TransportSingleOptions = {
  target: "pino-pretty",
  options: {
    colorize: true,
    singleLine: true,
    translateTime: "SYS:HH:MM:ss",
    ignore: "pid,hostname,service,name",
    destination: STDERR_FD,
  },
}

/**
 * Normalizes runtime environment values so logger behavior is explicit and stable even
 * when NODE_ENV is unset or loosely configured.
 *
 * @param value Optional environment value, defaulting to NODE_ENV.
 * @returns Runtime environment category used by logger policy.
 */
export const resolveRuntimeEnv = (value = process.env.NODE_ENV): RuntimeEnv => {
  if (value === "production") {
    return "production"
  }

  if (value === "test") {
    return "test"
  }

  return "development"
}

/**
 * Keeps diagnostic narration silent unless the operator asks for it, while critical
 * failures always reach stderr.
 *
 * @param input Optional overrides for env, level, verbosity and pretty printing.
 * @returns Pino logger options for the status check process.
 */
export const buildLoggerOptions = ({
  env = resolveRuntimeEnv(),
  logLevel,
  serviceName = "endpoint-status",
  verbose = false,
  prettyLogs = true,
}: BuildLoggerOptionsInput = {}): LoggerOptions => {
  const level = logLevel ?? (verbose ? "debug" : "error")
  const shouldUsePrettyTransport = env !== "production" && prettyLogs

  return {
    name: serviceName,
    level,
    base: {
      service: serviceName,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: shouldUsePrettyTransport ? PRETTY_TRANSPORT : undefined,
  }
}
