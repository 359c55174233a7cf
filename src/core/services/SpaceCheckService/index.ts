export { SpaceCheckServiceTag, SpaceCheckServiceLive } from "./SpaceCheckService";
export type { SpaceCheckService, SpaceCheckOptions } from "./SpaceCheckService";
