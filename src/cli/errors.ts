import { Match } from "effect";

import type { InvalidSizeFormat, SizeOutOfRange, UnknownSizeUnit } from "@lib/parseSize";
import { isPermissionError } from "@lib/ioError";
import type { NoDestinations, InvalidConcurrency } from "./optionParsing";

type DomainError =
  | NoDestinations
  | InvalidConcurrency
  | InvalidSizeFormat
  | UnknownSizeUnit
  | SizeOutOfRange;

const DOMAIN_TAGS: ReadonlySet<string> = new Set<DomainError["_tag"]>([
  "NoDestinations",
  "InvalidConcurrency",
  "InvalidSizeFormat",
  "UnknownSizeUnit",
  "SizeOutOfRange"
]);

export class AppError extends Error {
  readonly _tag = "AppError";

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`);
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`
    ].join("\n");
  }
}

const errors = {
  noDestinations: (input: string) =>
    new AppError(
      "No destinations",
      `No destination paths found in "${input}".`,
      `Pass one or more paths with --dest, separated by commas (e.g., --dest /Volumes/Backup,/Volumes/NAS).`
    ),

  invalidConcurrency: (value: number) =>
    new AppError(
      "Invalid concurrency",
      `Concurrency must be at least 1, got ${value}.`,
      `Leave out --concurrency to probe every destination at once.`
    ),

  invalidSize: (input: string) =>
    new AppError(
      "Invalid size",
      `Could not read "${input}" as a size.`,
      `Use formats like: 500MB, 50GB, 1.5TiB, or a plain byte count.`
    ),

  unknownUnit: (input: string, unit: string) =>
    new AppError(
      "Unknown size unit",
      `The unit "${unit}" in "${input}" is not recognised.`,
      `Use one of: B, KB, MB, GB, TB (decimal) or KiB, MiB, GiB, TiB (binary).`
    ),

  sizeOutOfRange: (input: string) =>
    new AppError(
      "Size too large",
      `"${input}" is more bytes than can be counted exactly.`,
      `Use a smaller size; sizes up to about 9 PB are supported.`
    ),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`),

  permissionDenied: (message: string) =>
    new AppError(
      "Permission denied",
      message,
      `Check that you have read access to each destination. Network shares may need to be remounted.`
    )
};

const matchDomainError = Match.typeTags<DomainError>()({
  NoDestinations: (e) => errors.noDestinations(e.input),
  InvalidConcurrency: (e) => errors.invalidConcurrency(e.value),
  InvalidSizeFormat: (e) => errors.invalidSize(e.input),
  UnknownSizeUnit: (e) => errors.unknownUnit(e.input, e.unit),
  SizeOutOfRange: (e) => errors.sizeOutOfRange(e.input)
});

const isDomainError = (e: unknown): e is DomainError =>
  typeof e === "object" &&
  e !== null &&
  "_tag" in e &&
  typeof e._tag === "string" &&
  DOMAIN_TAGS.has(e._tag);

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (isDomainError(error)) {
    return matchDomainError(error);
  }

  if (error instanceof Error) {
    return isPermissionError(error)
      ? errors.permissionDenied(error.message)
      : errors.unexpected(error.message);
  }

  return errors.unexpected(String(error));
};

export const {
  noDestinations,
  invalidConcurrency,
  invalidSize,
  unknownUnit,
  sizeOutOfRange,
  unexpected,
  permissionDenied
} = errors;
