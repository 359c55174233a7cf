/**
 * SpaceCheckService - probe and evaluate every backup destination, then
 * reduce the verdicts to one go/no-go decision.
 *
 * Never fails: a destination that cannot be probed turns into a blocking
 * verdict, not an error.
 */

import { Context, Effect, Layer, Option, pipe } from "effect"
import type { CapacityInfo } from "@domain/Capacity"
import { evaluateSpace, type SpacePolicy, type SpaceVerdict } from "@domain/SpaceVerdict"
import { decideSpaceChecks, type SpaceCheckReport } from "@domain/SpaceDecision"
import { CapacityProbeServiceTag } from "../CapacityProbeService"

export interface SpaceCheckOptions {
  readonly policy?: Partial<SpacePolicy>
  /** Destinations probed at once. Results keep input order either way. */
  readonly concurrency?: number | "unbounded"
}

export interface SpaceCheckService {
  readonly checkDestination: (
    destination: string,
    requiredBytes: number,
    policy?: Partial<SpacePolicy>
  ) => Effect.Effect<SpaceVerdict>
  readonly checkAll: (
    destinations: ReadonlyArray<string>,
    requiredBytes: number,
    options?: SpaceCheckOptions
  ) => Effect.Effect<SpaceCheckReport>
}

export class SpaceCheckServiceTag extends Context.Tag("SpaceCheckService")<
  SpaceCheckServiceTag,
  SpaceCheckService
>() {}

export const SpaceCheckServiceLive = Layer.effect(
  SpaceCheckServiceTag,
  Effect.gen(function* () {
    const prober = yield* CapacityProbeServiceTag

    const checkDestination = (
      destination: string,
      requiredBytes: number,
      policy: Partial<SpacePolicy> = {}
    ): Effect.Effect<SpaceVerdict> =>
      pipe(
        prober.probe(destination),
        Effect.map((result) => Option.some(result.capacity)),
        Effect.catchTag("CapacityProbeFailed", (e) =>
          pipe(
            Effect.logDebug(`No capacity for ${e.path} after ${e.attempted.join(", ")}`),
            Effect.as(Option.none<CapacityInfo>())
          )
        ),
        Effect.map((capacity) => evaluateSpace(destination, capacity, requiredBytes, policy))
      )

    const checkAll = (
      destinations: ReadonlyArray<string>,
      requiredBytes: number,
      options: SpaceCheckOptions = {}
    ): Effect.Effect<SpaceCheckReport> =>
      pipe(
        Effect.forEach(
          destinations,
          (destination) => checkDestination(destination, requiredBytes, options.policy),
          { concurrency: options.concurrency ?? "unbounded" }
        ),
        Effect.map((verdicts) => ({ verdicts, decision: decideSpaceChecks(verdicts) }))
      )

    return { checkDestination, checkAll }
  })
)
