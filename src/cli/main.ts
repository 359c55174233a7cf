#!/usr/bin/env tsx
/**
 * Backup Space Check CLI
 *
 * Checks whether every backup destination has room for a copy of the
 * given size, plus a safety buffer, and reports proceed / warn / block.
 *
 * Example:
 *   $ backup-space-check check --dest /Volumes/Backup --required 250GB
 *   $ backup-space-check check --dest /Volumes/A,/Volumes/NAS --required 1.2TB --json
 *
 * Exits with 2 when a destination blocks the backup, 1 on invalid input.
 */

import { Command } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect, Option, Logger, LogLevel } from "effect";

import * as Opts from "@cli/options";
import { runCheck, withErrorHandling, AppLive, CliLoggerLive } from "@cli/handler";

const checkCommand = Command.make(
  "check",
  {
    dest: Opts.dest,
    required: Opts.required,
    buffer: Opts.buffer,
    concurrency: Opts.concurrency,
    json: Opts.json,
    debug: Opts.debug
  },
  (opts) => {
    const program = withErrorHandling(
      runCheck({
        dest: opts.dest,
        required: opts.required,
        buffer: Option.getOrUndefined(opts.buffer),
        concurrency: Option.getOrUndefined(opts.concurrency),
        json: opts.json,
        debug: opts.debug
      })
    );

    return (
      opts.debug ? program.pipe(Effect.provide(Logger.minimumLogLevel(LogLevel.Debug))) : program
    ).pipe(Effect.provide(AppLive), Effect.provide(CliLoggerLive));
  }
).pipe(Command.withDescription("Check free space on backup destinations before copying"));

const rootCommand = Command.make("backup-space-check", {}).pipe(
  Command.withSubcommands([checkCommand]),
  Command.withDescription("Decide whether backup destinations have room for a copy")
);

const cli = Command.run(rootCommand, {
  name: "backup-space-check",
  version: "0.1.0"
});

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
