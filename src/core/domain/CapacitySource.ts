/**
 * Raw readings from each capacity source, and the rule for when a reading
 * is trusted. A reading that is not trusted yields `Option.none()` and the
 * probe moves on to the next source.
 */

import { Option, pipe } from "effect";
import { makeCapacityInfo, type CapacityInfo } from "./Capacity";

/** Fields of statfs(2), as returned by `fs.statfs`. */
export interface FsStats {
  readonly type: number;
  readonly bsize: number;
  readonly blocks: number;
  readonly bfree: number;
  readonly bavail: number;
}

export interface VolumeCapacity {
  readonly totalCapacity: Option.Option<number>;
  readonly availableCapacity: Option.Option<number>;
  readonly availableCapacityForImportantUsage: Option.Option<number>;
}

export interface FilesystemAttributes {
  readonly systemSize: Option.Option<number>;
  readonly systemFreeSize: Option.Option<number>;
}

// Some network volumes report a zero block count
export const fromFsStats = (stats: FsStats): Option.Option<CapacityInfo> => {
  const totalBytes = stats.blocks * stats.bsize;
  const availableBytes = stats.bavail * stats.bsize;
  const freeBytes = stats.bfree * stats.bsize;

  return totalBytes > 0 && availableBytes >= 0 && freeBytes >= 0
    ? Option.some(makeCapacityInfo({ totalBytes, freeBytes, availableBytes }))
    : Option.none();
};

/**
 * Volume-level capacity. Free and available are reported as the same
 * figure; "important usage" capacity wins over plain available capacity
 * when both are present.
 */
export const fromVolumeCapacity = (volume: VolumeCapacity): Option.Option<CapacityInfo> =>
  pipe(
    volume.totalCapacity,
    Option.filter((total) => total > 0),
    Option.map((totalBytes) => {
      const availableBytes = pipe(
        volume.availableCapacityForImportantUsage,
        Option.orElse(() => volume.availableCapacity),
        Option.getOrElse(() => 0)
      );
      return makeCapacityInfo({ totalBytes, freeBytes: availableBytes, availableBytes });
    })
  );

export const fromFilesystemAttributes = (
  attributes: FilesystemAttributes
): Option.Option<CapacityInfo> =>
  pipe(
    Option.all({ size: attributes.systemSize, free: attributes.systemFreeSize }),
    Option.filter(({ size }) => size > 0),
    Option.map(({ size, free }) =>
      makeCapacityInfo({ totalBytes: size, freeBytes: free, availableBytes: free })
    )
  );
