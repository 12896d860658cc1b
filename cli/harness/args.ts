/**
 * Argument parsing for the benchmark commands.
 *
 * Flags are collected with simple manual parsing, then validated and
 * converted by the zod option schemas.
 *
 * @module
 */

import { availableParallelism } from "node:os";
import { z } from "zod";
import { err, ok, type Result } from "../lib/result.ts";
import {
  BatteryOptionsSchema,
  RunOptionsSchema,
  type BatteryOptions,
  type RunOptions,
} from "../lib/schema.ts";

/**
 * Default operation count for scenarios without a fixed count.
 */
export const DEFAULT_OPERATIONS = 10_000;

/**
 * Raw flag values, before validation.
 */
export interface ParsedArgs {
  scenario?: string;
  operations?: string;
  threads?: string;
  json: boolean;
  /** Arguments that are not recognized flags */
  unknown: string[];
}

/**
 * Collect flag values from the command line.
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const result: ParsedArgs = { json: false, unknown: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case "--scenario":
      case "-s":
        result.scenario = next;
        i++;
        break;
      case "--operations":
      case "-n":
        result.operations = next;
        i++;
        break;
      case "--threads":
      case "-t":
        result.threads = next;
        i++;
        break;
      case "--json":
        result.json = true;
        break;
      default:
        result.unknown.push(arg);
    }
  }

  return result;
}

/**
 * Default worker thread count: one per available CPU.
 */
export function defaultThreads(): number {
  return availableParallelism();
}

/**
 * Parse a numeric flag; a missing flag takes the default.
 * Anything that is not a plain integer becomes NaN so the schema rejects it.
 */
function toCount(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  return /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
}

/**
 * One line per schema issue, e.g. "operations: Number must be less than or equal to 50000".
 */
export function summarizeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("\n");
}

function rejectUnknown(parsed: ParsedArgs): Error | undefined {
  return parsed.unknown.length > 0
    ? new Error(`  Unknown argument(s): ${parsed.unknown.join(" ")}`)
    : undefined;
}

/**
 * Validate arguments of the `run` command.
 */
export function validateRunArgs(args: readonly string[]): Result<RunOptions> {
  const parsed = parseArgs(args);
  const unknown = rejectUnknown(parsed);
  if (unknown) {
    return err("run arguments", unknown);
  }

  const result = RunOptionsSchema.safeParse({
    scenario: parsed.scenario ?? "balanced",
    operations: toCount(parsed.operations, DEFAULT_OPERATIONS),
    threads: toCount(parsed.threads, defaultThreads()),
    json: parsed.json,
  });
  if (!result.success) {
    return err("run arguments", new Error(summarizeIssues(result.error)));
  }
  return ok(result.data);
}

/**
 * Validate arguments of the `battery` command.
 */
export function validateBatteryArgs(args: readonly string[]): Result<BatteryOptions> {
  const parsed = parseArgs(args);
  const unknown = rejectUnknown(parsed) ??
    (parsed.scenario !== undefined || parsed.operations !== undefined
      ? new Error("  battery runs a fixed scenario list at a fixed operation count")
      : undefined);
  if (unknown) {
    return err("battery arguments", unknown);
  }

  const result = BatteryOptionsSchema.safeParse({
    threads: toCount(parsed.threads, defaultThreads()),
    json: parsed.json,
  });
  if (!result.success) {
    return err("battery arguments", new Error(summarizeIssues(result.error)));
  }
  return ok(result.data);
}
