/**
 * ShellService - wraps command execution for testability.
 */

import { Command, CommandExecutor } from "@effect/platform"
import { Context, Data, Effect, Layer, Stream, pipe } from "effect"
import { errorMessage } from "@lib/ioError"

export class ShellError extends Data.TaggedError("ShellError")<{
  readonly message: string
  readonly command: string
}> {}

export interface ShellResult {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number
}

export interface ShellService {
  readonly exec: (
    command: string,
    args: ReadonlyArray<string>
  ) => Effect.Effect<ShellResult, ShellError>
}

export class ShellServiceTag extends Context.Tag("ShellService")<
  ShellServiceTag,
  ShellService
>() {}

const collect = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  pipe(stream, Stream.decodeText(), Stream.mkString)

export const ShellServiceLive = Layer.effect(
  ShellServiceTag,
  Effect.map(CommandExecutor.CommandExecutor, (executor): ShellService => ({
    exec: (command, args) => {
      const commandLine = [command, ...args].join(" ")

      return pipe(
        Command.start(Command.make(command, ...args)),
        Effect.flatMap((proc) =>
          Effect.all([collect(proc.stdout), collect(proc.stderr), proc.exitCode], {
            concurrency: "unbounded",
          })
        ),
        Effect.map(([stdout, stderr, exitCode]) => ({ stdout, stderr, exitCode })),
        Effect.scoped,
        Effect.provideService(CommandExecutor.CommandExecutor, executor),
        Effect.mapError(
          (e) => new ShellError({ message: `Shell command failed: ${errorMessage(e)}`, command: commandLine })
        )
      )
    },
  }))
)
