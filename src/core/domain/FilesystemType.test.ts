import { describe, expect, test } from "vitest"
import { Option } from "effect"
import { filesystemTypeName, isNetworkFilesystem } from "./FilesystemType"

describe("filesystemTypeName", () => {
  test("maps known magic numbers", () => {
    expect(filesystemTypeName(0x6969)).toEqual(Option.some("nfs"))
    expect(filesystemTypeName(0xff534d42)).toEqual(Option.some("cifs"))
    expect(filesystemTypeName(0xef53)).toEqual(Option.some("ext4"))
  })

  test("normalises a sign-extended magic", () => {
    // 0xfe534d42 read back as a signed 32-bit integer
    expect(filesystemTypeName(-28095166)).toEqual(Option.some("smb2"))
  })

  test("unknown magic yields none", () => {
    expect(Option.isNone(filesystemTypeName(0x1234))).toBe(true)
  })
})

describe("isNetworkFilesystem", () => {
  test("recognises network types case-insensitively", () => {
    expect(isNetworkFilesystem("nfs")).toBe(true)
    expect(isNetworkFilesystem("SMBFS")).toBe(true)
    expect(isNetworkFilesystem("AfpFs")).toBe(true)
    expect(isNetworkFilesystem("webdav")).toBe(true)
    expect(isNetworkFilesystem("cifs")).toBe(true)
  })

  test("local filesystems are not network mounts", () => {
    expect(isNetworkFilesystem("ext4")).toBe(false)
    expect(isNetworkFilesystem("apfs")).toBe(false)
    expect(isNetworkFilesystem("fuse")).toBe(false)
  })
})
