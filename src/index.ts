#!/usr/bin/env node
import { isColorSupported } from "colorette"

import { parseCommand } from "./cli/command.js"
import { createLogger } from "./logging/logger.js"
import { runStatus } from "./runtime/status.js"

const main = async (): Promise<number> => {
  const command = parseCommand(process.argv.slice(2))
  if (command.type === "exit") {
    return command.exitCode
  }

  const logger = createLogger({ verbose: command.options.verbose })
  logger.debug({ options: command.options }, "Starting endpoint status check")

  return await runStatus(command.options, {
    logger,
    stdout: console,
    useColor: isColorSupported && process.stdout.isTTY === true,
  })
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode
  })
  .catch((error) => {
    const message = error instanceof Error ? error.message : String(error)
    console.error(message)
    process.exitCode = 1
  })
