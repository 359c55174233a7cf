export {
  CapacityProbeServiceTag,
  CapacityProbeServiceLive,
  CapacityProbeFailed
} from "./CapacityProbeService";
export type { CapacityProbeService, ProbeResult, ProbeStrategy } from "./CapacityProbeService";
