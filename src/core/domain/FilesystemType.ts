import { Option } from "effect";

// statfs f_type magic numbers (linux/magic.h)
const FILESYSTEM_MAGIC: ReadonlyMap<number, string> = new Map([
  [0x6969, "nfs"],
  [0x517b, "smbfs"],
  [0xfe534d42, "smb2"],
  [0xff534d42, "cifs"],
  [0x5346414f, "afs"],
  [0x01021997, "9p"],
  [0x65735546, "fuse"],
  [0xef53, "ext4"],
  [0x58465342, "xfs"],
  [0x9123683e, "btrfs"],
  [0x2fc12fc1, "zfs"],
  [0x01021994, "tmpfs"],
  [0x794c7630, "overlay"],
  [0x4d44, "vfat"],
  [0x2011bab0, "exfat"],
  [0x5346544e, "ntfs"]
]);

export const NETWORK_FILESYSTEM_TYPES: ReadonlySet<string> = new Set([
  "nfs",
  "smbfs",
  "smb2",
  "afpfs",
  "webdav",
  "davfs",
  "cifs"
]);

/** Unknown on platforms whose f_type is not a stable magic number (macOS, Windows). */
export const filesystemTypeName = (magic: number): Option.Option<string> =>
  Option.fromNullable(FILESYSTEM_MAGIC.get(magic >>> 0));

export const isNetworkFilesystem = (typeName: string): boolean =>
  NETWORK_FILESYSTEM_TYPES.has(typeName.toLowerCase());
