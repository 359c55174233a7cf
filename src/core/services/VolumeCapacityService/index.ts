export {
  VolumeCapacityServiceTag,
  VolumeCapacityServiceLive,
  VolumePermissionDenied,
  VolumeCapacityUnavailable
} from "./VolumeCapacityService";
export type { VolumeCapacityService, VolumeCapacityError } from "./VolumeCapacityService";
