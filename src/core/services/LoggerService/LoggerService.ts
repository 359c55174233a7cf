/**
 * LoggerService - formatted console output for the check command
 */

import { Context, Effect, Layer, Console, Option } from "effect"
import type { AggregateDecision } from "@domain/SpaceDecision"
import { formatVerdict } from "@domain/SpaceDecision"
import type { SpaceVerdict } from "@domain/SpaceVerdict"
import { formatSize } from "@lib/parseSize"

export interface LoggerService {
  readonly check: {
    readonly header: Effect.Effect<void>
    readonly checking: (stats: { destinations: number; requiredBytes: number; bufferBytes: number }) => Effect.Effect<void>
    readonly verdict: (verdict: SpaceVerdict) => Effect.Effect<void>
    readonly warnings: (warnings: ReadonlyArray<string>) => Effect.Effect<void>
    readonly errors: (errors: ReadonlyArray<string>) => Effect.Effect<void>
    readonly summary: (decision: AggregateDecision) => Effect.Effect<void>
  }
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

export const LoggerServiceLive = Layer.succeed(
  LoggerServiceTag,
  {
    check: {
      header: Console.log("\n💾 Backup Space Check\n"),
      checking: (stats) =>
        Console.log(
          `🔍 Checking ${stats.destinations} destination${stats.destinations === 1 ? "" : "s"} for ${formatSize(stats.requiredBytes)} (+${formatSize(stats.bufferBytes)} buffer)...\n`
        ),
      verdict: (verdict) => {
        const line = `   ${formatVerdict(verdict)}`
        return Option.isSome(verdict.error) ? Console.error(line) : Console.log(line)
      },
      warnings: (warnings) =>
        Effect.gen(function* () {
          if (warnings.length === 0) return
          yield* Console.log(`\n⚠️  Warnings (${warnings.length}):`)
          for (const warning of warnings) {
            yield* Console.log(`   ${warning}`)
          }
        }),
      errors: (errors) =>
        Effect.gen(function* () {
          if (errors.length === 0) return
          yield* Console.error(`\n❌ Errors (${errors.length}):`)
          for (const error of errors) {
            yield* Console.error(`   ${error}`)
          }
        }),
      summary: (decision) =>
        decision.canProceed
          ? Console.log(
              decision.warnings.length > 0
                ? "\n✓ Backup can proceed, with warnings\n"
                : "\n✅ Backup can proceed\n"
            )
          : Console.error("\n🛑 Backup blocked - resolve the errors above before copying\n"),
    },
  }
)
