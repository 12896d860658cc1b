/**
 * Command dispatcher for the benchmark CLI.
 *
 * Each command validates its own options and returns an exit code.
 *
 * @module
 */

import type { Operation } from "effection";
import { batteryCommand } from "./battery.ts";
import { helpCommand } from "./help.ts";
import { listCommand } from "./list.ts";
import { runCommand } from "./run.ts";

/**
 * Command handler signature.
 * Takes remaining args after the command name, returns exit code.
 */
export type CommandHandler = (args: string[]) => Operation<number>;

/**
 * Registry of available commands.
 */
const commands: Record<string, CommandHandler> = {
  run: runCommand,
  battery: batteryCommand,
  list: listCommand,
  help: helpCommand,
};

/**
 * Dispatch to the appropriate command handler.
 *
 * @param args - CLI arguments (e.g., ["run", "--scenario", "balanced"])
 * @returns Exit code
 */
export function* dispatch(args: string[]): Operation<number> {
  const [command, ...rest] = args;

  if (!command || command === "help" || command === "--help" || command === "-h") {
    return yield* helpCommand(rest);
  }

  // `lockbench run --help` shows the run help
  if (rest.includes("--help") || rest.includes("-h")) {
    return yield* helpCommand([command]);
  }

  const handler = commands[command];
  if (!handler) {
    console.error(`Unknown command: ${command}`);
    console.log();
    yield* helpCommand([]);
    return 1;
  }

  return yield* handler(rest);
}
