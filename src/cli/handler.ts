import { Console, Effect, Logger, pipe } from "effect"

import type { CheckOptions } from "./options"
import { parseCheckOptions } from "./optionParsing"
import { fromDomainError } from "./errors"

import { reportToJson, SpaceCheckServiceTag, AppLive, type SpaceCheckReport } from "@core"
import { LoggerServiceTag } from "@services/LoggerService"

/** Diagnostic log lines go to stderr so stdout carries only the report. */
export const CliLoggerLive = Logger.replace(
  Logger.defaultLogger,
  Logger.withConsoleError(Logger.logfmtLogger)
)

/** Exit code when a destination blocks the backup. */
export const BLOCKED_EXIT_CODE = 2

const setExitCode = (code: number) =>
  Effect.sync(() => {
    process.exitCode = code
  })

/**
 * Error handling wrapper for CLI commands
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) => {
      const appError = fromDomainError(error)
      return pipe(Console.error(`\n${appError.format()}`), Effect.zipRight(setExitCode(1)))
    }),
    Effect.asVoid
  )

/**
 * Run the check command
 */
export const runCheck = (options: CheckOptions) =>
  Effect.gen(function* () {
    const spaceCheck = yield* SpaceCheckServiceTag
    const logger = yield* LoggerServiceTag

    if (options.debug) {
      yield* Effect.logInfo("Debug logging enabled")
    }

    const parsed = yield* parseCheckOptions(options)

    if (!options.json) {
      yield* logger.check.header
      yield* logger.check.checking({
        destinations: parsed.destinations.length,
        requiredBytes: parsed.requiredBytes,
        bufferBytes: parsed.bufferBytes,
      })
    }

    const report: SpaceCheckReport = yield* spaceCheck.checkAll(
      parsed.destinations,
      parsed.requiredBytes,
      {
        policy: { safetyBufferBytes: parsed.bufferBytes },
        concurrency: parsed.concurrency,
      }
    )

    if (options.json) {
      yield* Console.log(JSON.stringify(reportToJson(report), null, 2))
    } else {
      yield* Effect.forEach(report.verdicts, logger.check.verdict, { discard: true })
      yield* logger.check.warnings(report.decision.warnings)
      yield* logger.check.errors(report.decision.errors)
      yield* logger.check.summary(report.decision)
    }

    if (!report.decision.canProceed) {
      yield* setExitCode(BLOCKED_EXIT_CODE)
    }

    return report
  })

/**
 * Export the application layer for CLI
 */
export { AppLive }
