import { describe, expect, test } from "vitest"
import { Option } from "effect"
import { makeCapacityInfo } from "./Capacity"
import {
  DEFAULT_SPACE_POLICY,
  UNKNOWN_SPACE_ERROR,
  blocksCopy,
  evaluateSpace,
  formattedRequired,
  resolvePolicy
} from "./SpaceVerdict"

const halfFullTerabyte = Option.some(
  makeCapacityInfo({
    totalBytes: 1_000_000_000_000,
    freeBytes: 500_000_000_000,
    availableBytes: 500_000_000_000
  })
)

const nearlyFull = Option.some(
  makeCapacityInfo({
    totalBytes: 100_000_000_000,
    freeBytes: 15_000_000_000,
    availableBytes: 15_000_000_000
  })
)

describe("evaluateSpace", () => {
  test("plenty of space yields neither warning nor error", () => {
    const verdict = evaluateSpace("/Volumes/Backup", halfFullTerabyte, 10_000_000_000)

    expect(verdict.sufficient).toBe(true)
    expect(verdict.totalRequiredBytes).toBe(10_100_000_000)
    expect(verdict.percentFreeAfterCopy).toBeCloseTo(49, 10)
    expect(verdict.lowFreeAfterCopy).toBe(false)
    expect(Option.isNone(verdict.warning)).toBe(true)
    expect(Option.isNone(verdict.error)).toBe(true)
    expect(blocksCopy(verdict)).toBe(false)
  })

  test("insufficient space cites required and available figures", () => {
    const verdict = evaluateSpace("/Volumes/Backup", halfFullTerabyte, 990_000_000_000)

    expect(verdict.sufficient).toBe(false)
    expect(verdict.totalRequiredBytes).toBe(990_100_000_000)
    expect(verdict.error).toEqual(
      Option.some("Insufficient space: Need 990.10 GB but only 500.00 GB available")
    )
    expect(Option.isNone(verdict.warning)).toBe(true)
    expect(blocksCopy(verdict)).toBe(true)
  })

  test("low free space after copy warns without blocking", () => {
    const verdict = evaluateSpace("/Volumes/Backup", nearlyFull, 6_000_000_000)

    expect(verdict.sufficient).toBe(true)
    expect(verdict.percentFreeAfterCopy).toBeCloseTo(9, 10)
    expect(verdict.lowFreeAfterCopy).toBe(true)
    expect(verdict.warning).toEqual(
      Option.some("Low disk space warning: After backup, only 9.0% will remain free")
    )
    expect(Option.isNone(verdict.error)).toBe(true)
    expect(blocksCopy(verdict)).toBe(false)
  })

  test("available space equal to required plus buffer is sufficient", () => {
    const verdict = evaluateSpace("/Volumes/Backup", nearlyFull, 14_900_000_000)

    expect(verdict.sufficient).toBe(true)
    expect(Option.isNone(verdict.error)).toBe(true)
  })

  test("one byte short of required plus buffer is insufficient", () => {
    const verdict = evaluateSpace("/Volumes/Backup", nearlyFull, 14_900_000_001)

    expect(verdict.sufficient).toBe(false)
    expect(Option.isSome(verdict.error)).toBe(true)
  })

  test("space after copy is not clamped at zero", () => {
    const verdict = evaluateSpace("/Volumes/Backup", halfFullTerabyte, 600_000_000_000)

    expect(verdict.percentFreeAfterCopy).toBeCloseTo(-10, 10)
    expect(verdict.lowFreeAfterCopy).toBe(true)
  })

  test("custom buffer changes the requirement", () => {
    const verdict = evaluateSpace("/Volumes/Backup", nearlyFull, 14_000_000_000, {
      safetyBufferBytes: 2_000_000_000
    })

    expect(verdict.totalRequiredBytes).toBe(16_000_000_000)
    expect(verdict.sufficient).toBe(false)
    expect(verdict.error).toEqual(
      Option.some("Insufficient space: Need 16.00 GB but only 15.00 GB available")
    )
  })

  test("custom threshold changes when the warning fires", () => {
    const verdict = evaluateSpace("/Volumes/Backup", halfFullTerabyte, 10_000_000_000, {
      lowFreeThresholdPercent: 50
    })

    expect(verdict.lowFreeAfterCopy).toBe(true)
    expect(verdict.warning).toEqual(
      Option.some("Low disk space warning: After backup, only 49.0% will remain free")
    )
  })

  test("unknown capacity blocks and counts as low space", () => {
    const verdict = evaluateSpace("/Volumes/Offline", Option.none(), 1_000)

    expect(verdict.sufficient).toBe(false)
    expect(verdict.lowFreeAfterCopy).toBe(true)
    expect(verdict.error).toEqual(Option.some(UNKNOWN_SPACE_ERROR))
    expect(Option.isNone(verdict.warning)).toBe(true)
    expect(verdict.capacity.totalBytes).toBe(0)
    expect(verdict.percentFreeAfterCopy).toBe(0)
    expect(blocksCopy(verdict)).toBe(true)
  })

  test("a zero total never divides by zero", () => {
    const empty = Option.some(makeCapacityInfo({ totalBytes: 0, freeBytes: 0, availableBytes: 0 }))
    const verdict = evaluateSpace("/Volumes/Empty", empty, 0, { safetyBufferBytes: 0 })

    expect(verdict.percentFreeAfterCopy).toBe(0)
    expect(verdict.sufficient).toBe(true)
    expect(verdict.lowFreeAfterCopy).toBe(true)
  })

  test("identical inputs give identical verdicts", () => {
    const first = evaluateSpace("/Volumes/Backup", nearlyFull, 6_000_000_000)
    const second = evaluateSpace("/Volumes/Backup", nearlyFull, 6_000_000_000)

    expect(second).toEqual(first)
  })

  test("sufficiency matches available against required plus buffer across sizes", () => {
    const available = 15_000_000_000
    for (const requiredBytes of [0, 1_000_000_000, 14_899_999_999, 14_900_000_000, 14_900_000_001, 20_000_000_000]) {
      const verdict = evaluateSpace("/Volumes/Backup", nearlyFull, requiredBytes)
      const expected = available >= requiredBytes + DEFAULT_SPACE_POLICY.safetyBufferBytes

      expect(verdict.sufficient).toBe(expected)
      expect(Option.isSome(verdict.error)).toBe(!expected)
    }
  })

  test("formattedRequired", () => {
    expect(formattedRequired(evaluateSpace("/Volumes/Backup", nearlyFull, 6_000_000_000))).toBe("6.00 GB")
  })
})

describe("resolvePolicy", () => {
  test("fills in defaults", () => {
    expect(resolvePolicy()).toEqual({ safetyBufferBytes: 100_000_000, lowFreeThresholdPercent: 10 })
    expect(resolvePolicy({ safetyBufferBytes: 0 })).toEqual({
      safetyBufferBytes: 0,
      lowFreeThresholdPercent: 10
    })
  })
})
