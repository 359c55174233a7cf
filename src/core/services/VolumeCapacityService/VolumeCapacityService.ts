/**
 * VolumeCapacityService - volume-level capacity through check-disk-space.
 *
 * check-disk-space resolves the mount that holds any path, so it rarely
 * fails. It reports one "free" figure, which is the space available to
 * the calling user; it has no notion of capacity for important usage.
 */

import { Context, Data, Effect, Layer, Option, pipe } from "effect"
import checkDiskSpace from "check-disk-space"
import type { VolumeCapacity } from "@domain/CapacitySource"
import { errorMessage, isPermissionError } from "@lib/ioError"

export class VolumePermissionDenied extends Data.TaggedError("VolumePermissionDenied")<{
  readonly path: string
}> {}

export class VolumeCapacityUnavailable extends Data.TaggedError("VolumeCapacityUnavailable")<{
  readonly path: string
  readonly cause: string
}> {}

export type VolumeCapacityError = VolumePermissionDenied | VolumeCapacityUnavailable

export interface VolumeCapacityService {
  readonly getCapacity: (path: string) => Effect.Effect<VolumeCapacity, VolumeCapacityError>
}

export class VolumeCapacityServiceTag extends Context.Tag("VolumeCapacityService")<
  VolumeCapacityServiceTag,
  VolumeCapacityService
>() {}

const toVolumeCapacityError = (path: string, error: unknown): VolumeCapacityError =>
  isPermissionError(error)
    ? new VolumePermissionDenied({ path })
    : new VolumeCapacityUnavailable({ path, cause: errorMessage(error) })

export const VolumeCapacityServiceLive = Layer.succeed(VolumeCapacityServiceTag, {
  getCapacity: (path) =>
    pipe(
      Effect.tryPromise({
        try: () => checkDiskSpace(path),
        catch: (e) => toVolumeCapacityError(path, e),
      }),
      Effect.map(({ free, size }) => ({
        totalCapacity: Option.some(size),
        availableCapacity: Option.some(free),
        availableCapacityForImportantUsage: Option.none(),
      }))
    ),
})
