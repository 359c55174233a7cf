import { Data, Effect } from "effect";

export class InvalidSizeFormat extends Data.TaggedError("InvalidSizeFormat")<{
  readonly input: string;
}> {}

export class UnknownSizeUnit extends Data.TaggedError("UnknownSizeUnit")<{
  readonly input: string;
  readonly unit: string;
}> {}

export class SizeOutOfRange extends Data.TaggedError("SizeOutOfRange")<{
  readonly input: string;
}> {}

export type SizeParseError = InvalidSizeFormat | UnknownSizeUnit | SizeOutOfRange;

const KB = 1000;
const MB = KB * 1000;
const GB = MB * 1000;
const TB = GB * 1000;

const KIB = 1024;
const MIB = KIB * 1024;
const GIB = MIB * 1024;
const TIB = GIB * 1024;

const UNITS: Record<string, number> = {
  b: 1,
  k: KB,
  kb: KB,
  kib: KIB,
  m: MB,
  mb: MB,
  mib: MIB,
  g: GB,
  gb: GB,
  gib: GIB,
  t: TB,
  tb: TB,
  tib: TIB
};

const safeBytes = (input: string, bytes: number): Effect.Effect<number, SizeOutOfRange> =>
  Number.isSafeInteger(bytes) ? Effect.succeed(bytes) : Effect.fail(new SizeOutOfRange({ input }));

/**
 * Parse a human size string into bytes.
 *
 * `KB`/`MB`/`GB`/`TB` (and the single-letter forms) are decimal, the `iB`
 * forms are binary, a bare number is bytes. Results past
 * `Number.MAX_SAFE_INTEGER` are rejected rather than rounded.
 */
export const parseSize = (input: string): Effect.Effect<number, SizeParseError> => {
  const trimmed = input.trim().toLowerCase();

  if (/^\d+$/.test(trimmed)) {
    return safeBytes(input, parseInt(trimmed, 10));
  }

  const match = trimmed.match(/^(\d+(?:\.\d+)?)\s*([a-z]+)$/);
  const numStr = match?.[1];
  const unit = match?.[2];

  if (!numStr || !unit) {
    return Effect.fail(new InvalidSizeFormat({ input }));
  }

  const multiplier = UNITS[unit];

  if (multiplier === undefined) {
    return Effect.fail(new UnknownSizeUnit({ input, unit }));
  }

  return safeBytes(input, Math.floor(parseFloat(numStr) * multiplier));
};

/** Decimal units throughout, so every message uses the same convention. */
export const formatSize = (bytes: number): string => {
  const absBytes = Math.abs(bytes);
  const sign = bytes < 0 ? "-" : "";

  if (absBytes < KB) return `${sign}${absBytes} B`;
  if (absBytes < MB) return `${sign}${(absBytes / KB).toFixed(1)} KB`;
  if (absBytes < GB) return `${sign}${(absBytes / MB).toFixed(1)} MB`;
  if (absBytes < TB) return `${sign}${(absBytes / GB).toFixed(2)} GB`;
  return `${sign}${(absBytes / TB).toFixed(2)} TB`;
};
