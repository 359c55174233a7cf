import { Options } from "@effect/cli";

export const dest = Options.text("dest").pipe(
  Options.withDescription("Backup destination paths (comma-separated)")
);

export const required = Options.text("required").pipe(
  Options.withDescription("Estimated backup size (e.g., 50GB, 1.5TiB, or raw bytes)")
);

export const buffer = Options.text("buffer").pipe(
  Options.withDescription("Safety buffer added to the required size (default: 100MB)"),
  Options.optional
);

export const concurrency = Options.integer("concurrency").pipe(
  Options.withDescription("Destinations probed in parallel (default: all at once)"),
  Options.optional
);

export const json = Options.boolean("json").pipe(
  Options.withDescription("Print the full report as JSON"),
  Options.withDefault(false)
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);

export interface CheckOptions {
  readonly dest: string;
  readonly required: string;
  readonly buffer: string | undefined;
  readonly concurrency: number | undefined;
  readonly json: boolean;
  readonly debug?: boolean;
}
