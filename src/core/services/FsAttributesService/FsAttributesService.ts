/**
 * FsAttributesService - filesystem size attributes from POSIX `df -kP`.
 *
 * Last resort when neither statfs nor volume capacity gives a usable
 * figure. Sizes in the POSIX format are 1024-byte blocks; the "Available"
 * column is taken as the free size.
 */

import { Context, Data, Effect, Layer, Option, pipe } from "effect"
import type { FilesystemAttributes } from "@domain/CapacitySource"
import { ShellServiceTag } from "../ShellService"

export class FsAttributesUnavailable extends Data.TaggedError("FsAttributesUnavailable")<{
  readonly path: string
  readonly reason: string
}> {}

export interface FsAttributesService {
  readonly getAttributes: (path: string) => Effect.Effect<FilesystemAttributes, FsAttributesUnavailable>
}

export class FsAttributesServiceTag extends Context.Tag("FsAttributesService")<
  FsAttributesServiceTag,
  FsAttributesService
>() {}

const BLOCK_SIZE = 1024

// <filesystem> <blocks> <used> <available> <capacity>% <mounted on>
const DF_ROW = /^(.*?)\s+(\d+)\s+(\d+)\s+(\d+)\s+(\d+|-)%\s+(.+)$/

const toBytes = (blocks: string | undefined): Option.Option<number> =>
  pipe(
    Option.fromNullable(blocks),
    Option.map((value) => parseInt(value, 10) * BLOCK_SIZE),
    Option.filter(Number.isFinite)
  )

/** Parse the data row of `df -kP` output. Missing fields come back as none. */
export const parseDfOutput = (stdout: string): FilesystemAttributes => {
  const row = stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(1)
    .at(-1)

  const match = row?.match(DF_ROW)

  return {
    systemSize: toBytes(match?.[2]),
    systemFreeSize: toBytes(match?.[4]),
  }
}

export const FsAttributesServiceLive = Layer.effect(
  FsAttributesServiceTag,
  Effect.gen(function* () {
    const shell = yield* ShellServiceTag

    const getAttributes = (path: string): Effect.Effect<FilesystemAttributes, FsAttributesUnavailable> =>
      pipe(
        shell.exec("df", ["-kP", path]),
        Effect.mapError((e) => new FsAttributesUnavailable({ path, reason: e.message })),
        Effect.flatMap(({ stdout, stderr, exitCode }) =>
          exitCode === 0
            ? Effect.succeed(parseDfOutput(stdout))
            : Effect.fail(
                new FsAttributesUnavailable({
                  path,
                  reason: stderr.trim() || `df exited with code ${exitCode}`,
                })
              )
        )
      )

    return { getAttributes }
  })
)
