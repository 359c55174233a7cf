import { Layer, pipe } from "effect";
import { NodeContext } from "@effect/platform-node";

export type { CapacityInfo } from "./domain/Capacity";
export {
  makeCapacityInfo,
  emptyCapacity,
  formattedTotal,
  formattedFree,
  formattedAvailable
} from "./domain/Capacity";
export type { FsStats, VolumeCapacity, FilesystemAttributes } from "./domain/CapacitySource";
export { filesystemTypeName, isNetworkFilesystem } from "./domain/FilesystemType";
export type { SpacePolicy, SpaceVerdict } from "./domain/SpaceVerdict";
export {
  DEFAULT_SPACE_POLICY,
  UNKNOWN_SPACE_ERROR,
  evaluateSpace,
  blocksCopy,
  formattedRequired
} from "./domain/SpaceVerdict";
export type { AggregateDecision, SpaceCheckReport } from "./domain/SpaceDecision";
export {
  decideSpaceChecks,
  destinationName,
  formatVerdict,
  reportToJson
} from "./domain/SpaceDecision";
export {
  parseSize,
  formatSize,
  InvalidSizeFormat,
  UnknownSizeUnit,
  SizeOutOfRange
} from "./lib/parseSize";
export type { SizeParseError } from "./lib/parseSize";

export {
  CapacityProbeServiceTag,
  CapacityProbeFailed
} from "./services/CapacityProbeService";
export type { CapacityProbeService, ProbeResult, ProbeStrategy } from "./services/CapacityProbeService";
export { SpaceCheckServiceTag } from "./services/SpaceCheckService";
export type { SpaceCheckService, SpaceCheckOptions } from "./services/SpaceCheckService";

import { FsStatsServiceLive } from "./services/FsStatsService";
import { VolumeCapacityServiceLive } from "./services/VolumeCapacityService";
import { FsAttributesServiceLive } from "./services/FsAttributesService";
import { ShellServiceLive } from "./services/ShellService";
import { CapacityProbeServiceLive } from "./services/CapacityProbeService";
import { SpaceCheckServiceLive } from "./services/SpaceCheckService";
import { LoggerServiceLive } from "./services/LoggerService";

const InfraLive = Layer.mergeAll(
  FsStatsServiceLive,
  VolumeCapacityServiceLive,
  pipe(FsAttributesServiceLive, Layer.provide(ShellServiceLive))
);

export const CapacityProbeFullLive = pipe(
  CapacityProbeServiceLive,
  Layer.provide(InfraLive),
  Layer.provide(NodeContext.layer)
);

export const SpaceCheckFullLive = pipe(SpaceCheckServiceLive, Layer.provide(CapacityProbeFullLive));

export const AppLive = Layer.mergeAll(SpaceCheckFullLive, LoggerServiceLive);
