import { Data, Effect } from "effect";
import { parseSize, type SizeParseError } from "@lib/parseSize";
import { DEFAULT_SPACE_POLICY } from "@domain/SpaceVerdict";
import type { CheckOptions } from "./options";

export class NoDestinations extends Data.TaggedError("NoDestinations")<{
  readonly input: string;
}> {}

export class InvalidConcurrency extends Data.TaggedError("InvalidConcurrency")<{
  readonly value: number;
}> {}

export const splitCommaSeparated = (value: string | undefined): string[] =>
  value
    ? value
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0)
    : [];

export interface ParsedCheckOptions {
  readonly destinations: string[];
  readonly requiredBytes: number;
  readonly bufferBytes: number;
  readonly concurrency: number | "unbounded";
}

export type CheckOptionsError = NoDestinations | InvalidConcurrency | SizeParseError;

export const parseCheckOptions = (
  options: Pick<CheckOptions, "dest" | "required" | "buffer" | "concurrency">
): Effect.Effect<ParsedCheckOptions, CheckOptionsError> =>
  Effect.gen(function* () {
    const destinations = splitCommaSeparated(options.dest);
    if (destinations.length === 0) {
      return yield* Effect.fail(new NoDestinations({ input: options.dest }));
    }

    const requiredBytes = yield* parseSize(options.required);
    const bufferBytes = options.buffer
      ? yield* parseSize(options.buffer)
      : DEFAULT_SPACE_POLICY.safetyBufferBytes;

    const concurrency = options.concurrency ?? "unbounded";
    if (concurrency !== "unbounded" && concurrency < 1) {
      return yield* Effect.fail(new InvalidConcurrency({ value: concurrency }));
    }

    return { destinations, requiredBytes, bufferBytes, concurrency };
  });
