import { describe, expect, test } from "vitest"
import { Effect, Either, Layer, Option, pipe } from "effect"
import { FsAttributesServiceTag, FsAttributesServiceLive, parseDfOutput } from "./FsAttributesService"
import { ShellServiceTag, type ShellResult } from "../ShellService"

const LINUX_DF = `Filesystem     1024-blocks     Used Available Capacity Mounted on
/dev/sda1        102400000 50000000  52400000      49% /
`

const MACOS_DF = `Filesystem       1024-blocks      Used Available Capacity  Mounted on
//guest@nas._smb._tcp.local/Photo Archive 3906250000 2000000000 1906250000    52%    /Volumes/Photo Archive
`

describe("parseDfOutput", () => {
  test("reads total and available blocks as bytes", () => {
    expect(parseDfOutput(LINUX_DF)).toEqual({
      systemSize: Option.some(102400000 * 1024),
      systemFreeSize: Option.some(52400000 * 1024)
    })
  })

  test("copes with spaces in the filesystem and mount names", () => {
    expect(parseDfOutput(MACOS_DF)).toEqual({
      systemSize: Option.some(3906250000 * 1024),
      systemFreeSize: Option.some(1906250000 * 1024)
    })
  })

  test("header only yields no attributes", () => {
    const attributes = parseDfOutput("Filesystem 1024-blocks Used Available Capacity Mounted on\n")

    expect(Option.isNone(attributes.systemSize)).toBe(true)
    expect(Option.isNone(attributes.systemFreeSize)).toBe(true)
  })

  test("empty output yields no attributes", () => {
    expect(Option.isNone(parseDfOutput("").systemSize)).toBe(true)
  })
})

const shellReturning = (result: ShellResult, seen: string[][] = []) =>
  Layer.succeed(ShellServiceTag, {
    exec: (command: string, args: ReadonlyArray<string>) => {
      seen.push([command, ...args])
      return Effect.succeed(result)
    }
  })

const getAttributes = (shell: Layer.Layer<ShellServiceTag>, path: string) =>
  pipe(
    FsAttributesServiceTag,
    Effect.flatMap((svc) => svc.getAttributes(path)),
    Effect.provide(pipe(FsAttributesServiceLive, Layer.provide(shell))),
    Effect.either,
    Effect.runPromise
  )

describe("FsAttributesService", () => {
  test("runs df in POSIX kilobyte mode on the path", async () => {
    const seen: string[][] = []
    const result = await getAttributes(
      shellReturning({ stdout: LINUX_DF, stderr: "", exitCode: 0 }, seen),
      "/Volumes/Backup"
    )

    expect(seen).toEqual([["df", "-kP", "/Volumes/Backup"]])
    expect(Either.isRight(result)).toBe(true)
    if (Either.isRight(result)) {
      expect(result.right.systemSize).toEqual(Option.some(102400000 * 1024))
    }
  })

  test("non-zero exit fails with stderr as the reason", async () => {
    const result = await getAttributes(
      shellReturning({ stdout: "", stderr: "df: /nope: No such file or directory\n", exitCode: 1 }),
      "/nope"
    )

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("FsAttributesUnavailable")
      expect(result.left.reason).toBe("df: /nope: No such file or directory")
    }
  })
})
