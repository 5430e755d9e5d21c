import type { Logger } from "pino"

import { createFileTokenProvider, resolveAccessToken, type TokenProvider } from "../auth/token.js"
import type { StatusOptions } from "../cli/command.js"
import { resolveStatusConfig } from "../config/status-config.js"
import { createInferenceApiClient, type FetchLike } from "../http/client.js"
import { createComponentLogger } from "../logging/logger.js"
import { renderStatusReport } from "../presentation/report.js"
import { runStatusCheck } from "../status/check.js"

export type StatusRuntimeDependencies = {
  logger: Logger
  stdout: Pick<Console, "log">
  environment?: NodeJS.ProcessEnv
  fetchImpl?: FetchLike
  tokenProvider?: TokenProvider
  useColor?: boolean
  now?: () => Date
}

/**
 * Runs one status check end to end: configuration, credentials, the two fetch phases and
 * the report. Failures are logged and turned into exit code 1.
 *
 * @param options Parsed CLI flags.
 * @param dependencies Logger, output stream and overridable environment collaborators.
 * @returns Process exit code.
 */
export const runStatus = async (
  options: StatusOptions,
  dependencies: StatusRuntimeDependencies
): Promise<number> => {
  const { logger, stdout } = dependencies
  const environment = dependencies.environment ?? process.env

  try {
    const config = resolveStatusConfig(environment)
    const { token, source } = await resolveAccessToken({
      provider: dependencies.tokenProvider ?? createFileTokenProvider(config.tokenFile),
      environment,
      logger: createComponentLogger("auth", logger),
    })
    logger.debug({ source, apiHost: config.apiHost }, "Initialized inference API client")

    const client = createInferenceApiClient({
      apiHost: config.apiHost,
      token,
      timeoutMs: config.requestTimeoutMs,
      logger: createComponentLogger("http", logger),
      fetchImpl: dependencies.fetchImpl,
    })

    const result = await runStatusCheck({
      client,
      apiHost: config.apiHost,
      jobsCluster: config.jobsCluster,
      logger: createComponentLogger("status", logger),
    })

    const lines = renderStatusReport({
      result,
      verbose: options.verbose,
      liveOnly: options.liveOnly,
      useColor: dependencies.useColor ?? false,
      completedAt: (dependencies.now ?? (() => new Date()))(),
    })

    for (const line of lines) {
      stdout.log(line)
    }

    return 0
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    logger.error({ error: message }, "Status check failed")
    return 1
  }
}
