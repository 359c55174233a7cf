/**
 * FsStatsService - wraps statfs(2) for testability.
 *
 * One call yields both the filesystem type (used to spot network mounts)
 * and the raw block counts.
 */

import { statfs } from "node:fs/promises"
import { Context, Data, Effect, Layer, pipe } from "effect"
import type { FsStats } from "@domain/CapacitySource"
import { errorMessage, isNotFoundError, isPermissionError } from "@lib/ioError"

export class FsStatsNotFound extends Data.TaggedError("FsStatsNotFound")<{
  readonly path: string
}> {}

export class FsStatsPermissionDenied extends Data.TaggedError("FsStatsPermissionDenied")<{
  readonly path: string
}> {}

export class FsStatsUnknownError extends Data.TaggedError("FsStatsUnknownError")<{
  readonly path: string
  readonly cause: string
}> {}

export type FsStatsError = FsStatsNotFound | FsStatsPermissionDenied | FsStatsUnknownError

export interface FsStatsService {
  readonly statfs: (path: string) => Effect.Effect<FsStats, FsStatsError>
}

export class FsStatsServiceTag extends Context.Tag("FsStatsService")<
  FsStatsServiceTag,
  FsStatsService
>() {}

const toFsStatsError = (path: string, error: unknown): FsStatsError => {
  if (isPermissionError(error)) {
    return new FsStatsPermissionDenied({ path })
  }
  if (isNotFoundError(error)) {
    return new FsStatsNotFound({ path })
  }
  return new FsStatsUnknownError({ path, cause: errorMessage(error) })
}

export const FsStatsServiceLive = Layer.succeed(FsStatsServiceTag, {
  statfs: (path) =>
    pipe(
      Effect.tryPromise({
        try: () => statfs(path),
        catch: (e) => toFsStatsError(path, e),
      }),
      Effect.map(({ type, bsize, blocks, bfree, bavail }) => ({ type, bsize, blocks, bfree, bavail }))
    ),
})
