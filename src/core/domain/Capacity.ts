import { formatSize } from "../lib/parseSize";

export interface CapacityInfo {
  readonly totalBytes: number;
  /** Unused space, including blocks reserved for privileged processes. */
  readonly freeBytes: number;
  /** Space this (unprivileged) process can actually write to. */
  readonly availableBytes: number;
  readonly percentFree: number;
  readonly percentAvailable: number;
}

export const percentOf = (bytes: number, totalBytes: number): number =>
  totalBytes === 0 ? 0 : (bytes * 100) / totalBytes;

export const makeCapacityInfo = (bytes: {
  readonly totalBytes: number;
  readonly freeBytes: number;
  readonly availableBytes: number;
}): CapacityInfo => ({
  totalBytes: bytes.totalBytes,
  freeBytes: bytes.freeBytes,
  availableBytes: bytes.availableBytes,
  percentFree: percentOf(bytes.freeBytes, bytes.totalBytes),
  percentAvailable: percentOf(bytes.availableBytes, bytes.totalBytes)
});

export const emptyCapacity: CapacityInfo = makeCapacityInfo({
  totalBytes: 0,
  freeBytes: 0,
  availableBytes: 0
});

export const formattedTotal = (capacity: CapacityInfo): string => formatSize(capacity.totalBytes);

export const formattedFree = (capacity: CapacityInfo): string => formatSize(capacity.freeBytes);

export const formattedAvailable = (capacity: CapacityInfo): string =>
  formatSize(capacity.availableBytes);
