export {
  FsStatsServiceTag,
  FsStatsServiceLive,
  FsStatsNotFound,
  FsStatsPermissionDenied,
  FsStatsUnknownError
} from "./FsStatsService";
export type { FsStatsService, FsStatsError } from "./FsStatsService";
