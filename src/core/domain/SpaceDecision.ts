import { basename } from "node:path";
import { Option } from "effect";
import { formattedAvailable } from "./Capacity";
import { blocksCopy, type SpaceVerdict } from "./SpaceVerdict";

export interface AggregateDecision {
  readonly canProceed: boolean;
  readonly warnings: ReadonlyArray<string>;
  readonly errors: ReadonlyArray<string>;
}

export interface SpaceCheckReport {
  readonly verdicts: ReadonlyArray<SpaceVerdict>;
  readonly decision: AggregateDecision;
}

/** Last path segment, or the whole path for a root like "/". */
export const destinationName = (destination: string): string =>
  basename(destination) || destination;

const labelled = (verdict: SpaceVerdict, message: Option.Option<string>): string[] =>
  Option.toArray(Option.map(message, (text) => `${destinationName(verdict.destination)}: ${text}`));

export const decideSpaceChecks = (verdicts: ReadonlyArray<SpaceVerdict>): AggregateDecision => {
  const errors = verdicts.flatMap((verdict) => labelled(verdict, verdict.error));
  const warnings = verdicts.flatMap((verdict) => labelled(verdict, verdict.warning));

  return { canProceed: errors.length === 0, warnings, errors };
};

export const formatVerdict = (verdict: SpaceVerdict): string => {
  const name = destinationName(verdict.destination);

  if (Option.isSome(verdict.error)) {
    return `❌ ${name}: ${verdict.error.value}`;
  }
  if (Option.isSome(verdict.warning)) {
    return `⚠️ ${name}: ${verdict.warning.value}`;
  }
  return `✅ ${name}: ${formattedAvailable(verdict.capacity)} available`;
};

export interface SpaceVerdictJson {
  readonly destination: string;
  readonly totalBytes: number;
  readonly freeBytes: number;
  readonly availableBytes: number;
  readonly requiredBytes: number;
  readonly totalRequiredBytes: number;
  readonly sufficient: boolean;
  readonly lowFreeAfterCopy: boolean;
  readonly blocksCopy: boolean;
  readonly percentFreeAfterCopy: number;
  readonly warning: string | null;
  readonly error: string | null;
}

export const reportToJson = (
  report: SpaceCheckReport
): { readonly decision: AggregateDecision; readonly verdicts: ReadonlyArray<SpaceVerdictJson> } => ({
  decision: report.decision,
  verdicts: report.verdicts.map((verdict) => ({
    destination: verdict.destination,
    totalBytes: verdict.capacity.totalBytes,
    freeBytes: verdict.capacity.freeBytes,
    availableBytes: verdict.capacity.availableBytes,
    requiredBytes: verdict.requiredBytes,
    totalRequiredBytes: verdict.totalRequiredBytes,
    sufficient: verdict.sufficient,
    lowFreeAfterCopy: verdict.lowFreeAfterCopy,
    blocksCopy: blocksCopy(verdict),
    percentFreeAfterCopy: verdict.percentFreeAfterCopy,
    warning: Option.getOrNull(verdict.warning),
    error: Option.getOrNull(verdict.error)
  }))
});
