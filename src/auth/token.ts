import { readFile } from "node:fs/promises"

import type { Logger } from "pino"

export const ACCESS_TOKEN_ENV = "ALCF_ACCESS_TOKEN"

export class MissingCredentialError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "MissingCredentialError"
  }
}

/**
 * Supplies a bearer token from an external source. Implementations throw when they cannot.
 */
export type TokenProvider = () => Promise<string>

type ResolveAccessTokenInput = {
  provider: TokenProvider
  environment: NodeJS.ProcessEnv
  logger: Pick<Logger, "debug" | "warn">
}

export type ResolvedAccessToken = {
  token: string
  source: "provider" | "environment"
}

/**
 * Reads a token persisted by an external login helper. The file holds the bare token.
 *
 * @param tokenPath Token file location, or null when none is configured.
 */
export const createFileTokenProvider = (tokenPath: string | null): TokenProvider => {
  return async () => {
    if (!tokenPath) {
      throw new Error("No token file configured")
    }

    const source = await readFile(tokenPath, "utf8")
    const token = source.trim()
    if (token.length === 0) {
      throw new Error(`Token file is empty: ${tokenPath}`)
    }

    return token
  }
}

/**
 * Asks the token provider first and falls back to the environment. Having neither is the
 * one precondition the status check cannot run without.
 *
 * @returns Token and where it came from.
 */
export const resolveAccessToken = async ({
  provider,
  environment,
  logger,
}: ResolveAccessTokenInput): Promise<ResolvedAccessToken> => {
  try {
    const token = await provider()
    logger.debug("Access token obtained from token provider")
    return { token, source: "provider" }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    logger.warn({ error: message }, "Token provider failed; falling back to environment")
  }

  const token = environment[ACCESS_TOKEN_ENV]?.trim()
  if (!token) {
    throw new MissingCredentialError(
      `Set ${ACCESS_TOKEN_ENV} or configure INFERENCE_TOKEN_FILE with a valid access token`
    )
  }

  logger.debug("Access token obtained from environment variable")
  return { token, source: "environment" }
}
