/**
 * CapacityProbeService - total/free/available bytes for one path.
 *
 * Sources are tried in order and the first trusted reading wins:
 *
 *   1. statfs block counts, only when the path sits on a network mount
 *      (higher-level capacity APIs misreport those)
 *   2. volume capacity (check-disk-space)
 *   3. filesystem attributes (df)
 *
 * A reading with a zero total is never trusted. A path statfs cannot find
 * fails the probe at once: check-disk-space would report the parent
 * volume for it. Other source errors are logged and treated as "not
 * trusted"; when nothing is left the probe fails with CapacityProbeFailed,
 * which callers must read as "unknown", not "full".
 */

import { Context, Data, Effect, Either, Layer, Option, pipe } from "effect"
import type { CapacityInfo } from "@domain/Capacity"
import {
  fromFilesystemAttributes,
  fromFsStats,
  fromVolumeCapacity,
  type FsStats,
} from "@domain/CapacitySource"
import { filesystemTypeName, isNetworkFilesystem } from "@domain/FilesystemType"
import { FsStatsServiceTag } from "../FsStatsService"
import { VolumeCapacityServiceTag } from "../VolumeCapacityService"
import { FsAttributesServiceTag } from "../FsAttributesService"

export type ProbeStrategy = "statfs" | "volume" | "attributes"

export interface ProbeResult {
  readonly path: string
  readonly capacity: CapacityInfo
  readonly strategy: ProbeStrategy
  readonly filesystemType: Option.Option<string>
}

export class CapacityProbeFailed extends Data.TaggedError("CapacityProbeFailed")<{
  readonly path: string
  readonly attempted: ReadonlyArray<ProbeStrategy>
}> {}

export interface CapacityProbeService {
  readonly probe: (path: string) => Effect.Effect<ProbeResult, CapacityProbeFailed>
}

export class CapacityProbeServiceTag extends Context.Tag("CapacityProbeService")<
  CapacityProbeServiceTag,
  CapacityProbeService
>() {}

interface ProbeStep {
  readonly strategy: ProbeStrategy
  readonly read: Effect.Effect<Option.Option<CapacityInfo>>
}

/** Run a source; a failure becomes "no reading" plus a debug line. */
const untrustedOnFailure = <E extends { readonly _tag: string }>(
  path: string,
  strategy: ProbeStrategy,
  read: Effect.Effect<Option.Option<CapacityInfo>, E>
): Effect.Effect<Option.Option<CapacityInfo>> =>
  pipe(
    read,
    Effect.catchAll((e) =>
      pipe(
        Effect.logDebug(`${strategy} failed for ${path}: ${e._tag}`),
        Effect.as(Option.none<CapacityInfo>())
      )
    )
  )

export const CapacityProbeServiceLive = Layer.effect(
  CapacityProbeServiceTag,
  Effect.gen(function* () {
    const fsStats = yield* FsStatsServiceTag
    const volumes = yield* VolumeCapacityServiceTag
    const attributes = yield* FsAttributesServiceTag

    const networkStep = (path: string, stats: FsStats): ProbeStep => ({
      strategy: "statfs",
      read: pipe(
        Effect.succeed(fromFsStats(stats)),
        Effect.tap((capacity) =>
          Option.isNone(capacity)
            ? Effect.logInfo(
                `Network volume ${path} reported unreliable space values, trying alternate methods`
              )
            : Effect.void
        )
      ),
    })

    const probe = (path: string): Effect.Effect<ProbeResult, CapacityProbeFailed> =>
      Effect.gen(function* () {
        // One statfs call serves both mount-type detection and the network reading
        const stats = yield* Effect.either(fsStats.statfs(path))
        if (Either.isLeft(stats)) {
          yield* Effect.logDebug(`statfs failed for ${path}: ${stats.left._tag}`)
          if (stats.left._tag === "FsStatsNotFound") {
            yield* Effect.logWarning(`Destination ${path} does not exist`)
            return yield* Effect.fail(new CapacityProbeFailed({ path, attempted: ["statfs"] }))
          }
        }

        const filesystemType = Either.isRight(stats)
          ? filesystemTypeName(stats.right.type)
          : Option.none<string>()
        const onNetworkMount = Option.exists(filesystemType, isNetworkFilesystem)

        const steps: ReadonlyArray<ProbeStep> = [
          ...(onNetworkMount && Either.isRight(stats) ? [networkStep(path, stats.right)] : []),
          {
            strategy: "volume",
            read: untrustedOnFailure(
              path,
              "volume",
              Effect.suspend(() => Effect.map(volumes.getCapacity(path), fromVolumeCapacity))
            ),
          },
          {
            strategy: "attributes",
            read: untrustedOnFailure(
              path,
              "attributes",
              Effect.suspend(() =>
                Effect.map(attributes.getAttributes(path), fromFilesystemAttributes)
              )
            ),
          },
        ]

        const attempted: ProbeStrategy[] = []
        for (const step of steps) {
          attempted.push(step.strategy)
          const capacity = yield* step.read
          if (Option.isSome(capacity)) {
            yield* Effect.logDebug(
              `Capacity for ${path} from ${step.strategy} (${Option.getOrElse(filesystemType, () => "unknown")})`
            )
            return { path, capacity: capacity.value, strategy: step.strategy, filesystemType }
          }
        }

        yield* Effect.logWarning(`Failed to get disk space for ${path}`)
        return yield* Effect.fail(new CapacityProbeFailed({ path, attempted }))
      })

    return { probe }
  })
)
