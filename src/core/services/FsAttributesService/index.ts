export {
  FsAttributesServiceTag,
  FsAttributesServiceLive,
  FsAttributesUnavailable,
  parseDfOutput
} from "./FsAttributesService";
export type { FsAttributesService } from "./FsAttributesService";
