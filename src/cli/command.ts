import { Command, CommanderError } from "commander"

import { getAppVersion } from "../version.js"

export type StatusOptions = {
  verbose: boolean
  liveOnly: boolean
}

export type ParsedCommand =
  | {
      type: "check"
      options: StatusOptions
    }
  | {
      type: "exit"
      exitCode: number
    }

/**
 * Parses the status CLI flags. Help and version output are reported as an `exit` result so
 * the entrypoint decides how the process ends.
 *
 * @param argv Raw user arguments from process argv.
 * @returns Options for a status check, or the exit code of an informational command.
 */
export const parseCommand = (argv: string[]): ParsedCommand => {
  const parser = new Command()

  parser
    .name("endpoint-status")
    .description("Check model endpoint availability and job status on the inference cluster")
    .version(getAppVersion())
    .exitOverride()
    .configureOutput({
      writeErr: () => {},
    })
    .allowUnknownOption(false)
    .allowExcessArguments(false)
    .option("-v, --verbose", "enable verbose logging with detailed progress information", false)
    .option("-l, --live-only", "show only live, starting and queued models", false)

  try {
    parser.parse(argv, { from: "user" })
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.exitCode === 0) {
        return { type: "exit", exitCode: 0 }
      }

      throw new Error(error.message)
    }

    if (error instanceof Error) {
      throw error
    }

    throw new Error("Unknown command parsing error")
  }

  const options = parser.opts<{ verbose: boolean; liveOnly: boolean }>()

  return {
    type: "check",
    options: {
      verbose: options.verbose,
      liveOnly: options.liveOnly,
    },
  }
}
