import { Option } from "effect";
import { emptyCapacity, formattedAvailable, type CapacityInfo } from "./Capacity";
import { formatSize } from "../lib/parseSize";

export interface SpacePolicy {
  /** Extra bytes required on top of the payload so a copy never lands on an exact fit. */
  readonly safetyBufferBytes: number;
  readonly lowFreeThresholdPercent: number;
}

export const DEFAULT_SPACE_POLICY: SpacePolicy = {
  safetyBufferBytes: 100_000_000,
  lowFreeThresholdPercent: 10
};

export interface SpaceVerdict {
  readonly destination: string;
  readonly capacity: CapacityInfo;
  readonly requiredBytes: number;
  readonly totalRequiredBytes: number;
  readonly sufficient: boolean;
  readonly percentFreeAfterCopy: number;
  readonly lowFreeAfterCopy: boolean;
  readonly warning: Option.Option<string>;
  readonly error: Option.Option<string>;
}

export const UNKNOWN_SPACE_ERROR = "Unable to determine available disk space";

export const resolvePolicy = (policy: Partial<SpacePolicy> = {}): SpacePolicy => ({
  safetyBufferBytes: policy.safetyBufferBytes ?? DEFAULT_SPACE_POLICY.safetyBufferBytes,
  lowFreeThresholdPercent:
    policy.lowFreeThresholdPercent ?? DEFAULT_SPACE_POLICY.lowFreeThresholdPercent
});

/**
 * Decide whether `requiredBytes` fits on a destination.
 *
 * `Option.none()` capacity means probing failed; the verdict then blocks
 * and is treated as low on space. An error always takes priority over a
 * warning, so at most one of the two is set.
 */
export const evaluateSpace = (
  destination: string,
  capacity: Option.Option<CapacityInfo>,
  requiredBytes: number,
  policy: Partial<SpacePolicy> = {}
): SpaceVerdict => {
  const { safetyBufferBytes, lowFreeThresholdPercent } = resolvePolicy(policy);
  const totalRequiredBytes = requiredBytes + safetyBufferBytes;

  if (Option.isNone(capacity)) {
    return {
      destination,
      capacity: emptyCapacity,
      requiredBytes,
      totalRequiredBytes,
      sufficient: false,
      percentFreeAfterCopy: 0,
      lowFreeAfterCopy: true,
      warning: Option.none(),
      error: Option.some(UNKNOWN_SPACE_ERROR)
    };
  }

  const info = capacity.value;
  const sufficient = info.availableBytes >= totalRequiredBytes;

  // Not clamped: a negative figure means the copy overruns free space
  const spaceAfterCopy = info.freeBytes - requiredBytes;
  const percentFreeAfterCopy =
    info.totalBytes === 0 ? 0 : (spaceAfterCopy * 100) / info.totalBytes;
  const lowFreeAfterCopy = percentFreeAfterCopy < lowFreeThresholdPercent;

  const error = sufficient
    ? Option.none<string>()
    : Option.some(
        `Insufficient space: Need ${formatSize(totalRequiredBytes)} but only ${formattedAvailable(info)} available`
      );

  const warning =
    sufficient && lowFreeAfterCopy
      ? Option.some(
          `Low disk space warning: After backup, only ${percentFreeAfterCopy.toFixed(1)}% will remain free`
        )
      : Option.none<string>();

  return {
    destination,
    capacity: info,
    requiredBytes,
    totalRequiredBytes,
    sufficient,
    percentFreeAfterCopy,
    lowFreeAfterCopy,
    warning,
    error
  };
};

export const blocksCopy = (verdict: SpaceVerdict): boolean =>
  !verdict.sufficient || Option.isSome(verdict.error);

export const formattedRequired = (verdict: SpaceVerdict): string =>
  formatSize(verdict.requiredBytes);
