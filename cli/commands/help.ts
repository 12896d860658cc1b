/**
 * Help command implementation.
 *
 * @module
 */

import type { Operation } from "effection";

const MAIN_HELP = `
Lock Benchmark CLI

Usage: lockbench <command> [options]

Commands:
  run             Benchmark every container in one workload scenario
  battery         Run the five-scenario battery at 50,000 operations
  list            List workload scenarios
  help            Show this help message

Run 'lockbench help <command>' for command-specific help.

Examples:
  lockbench run --scenario read-heavy --operations 20000
  lockbench battery --threads 4
  lockbench list
`.trim();

const RUN_HELP = `
lockbench run - Benchmark every container in one workload scenario

Usage:
  lockbench run [options]

Options:
  --scenario, -s    Scenario key (default: balanced); see 'lockbench list'
  --operations, -n  Operation count, 1000-50000 (default: 10000).
                    Ignored by low-volume, serial and scaling.
  --threads, -t     Worker threads for the concurrent fan-out
                    (default: one per CPU; 0 runs on the main thread)
  --json            Print a JSON report instead of a table

Examples:
  lockbench run --scenario heavy-work
  lockbench run -s balanced -n 50000 -t 8
  lockbench run --scenario scaling --json
`.trim();

const BATTERY_HELP = `
lockbench battery - Run the five-scenario battery

Usage:
  lockbench battery [options]

Runs balanced, read-heavy, write-heavy, heavy-work and serial at 50,000
operations each. Results are reported per scenario.

Options:
  --threads, -t     Worker threads for the concurrent fan-out
                    (default: one per CPU; 0 runs on the main thread)
  --json            Print a JSON report instead of tables

Examples:
  lockbench battery
  lockbench battery --threads 2 --json
`.trim();

const LIST_HELP = `
lockbench list - List workload scenarios

Usage:
  lockbench list

Shows each scenario key with its title and description.
`.trim();

const COMMAND_HELP: Record<string, string> = {
  run: RUN_HELP,
  battery: BATTERY_HELP,
  list: LIST_HELP,
  help: MAIN_HELP,
};

/**
 * Display help for a command or general usage.
 */
export function* helpCommand(args: string[]): Operation<number> {
  const subcommand = args[0];

  if (subcommand && COMMAND_HELP[subcommand]) {
    console.log(COMMAND_HELP[subcommand]);
  } else if (subcommand) {
    console.error(`Unknown command: ${subcommand}`);
    console.log();
    console.log(MAIN_HELP);
    return 1;
  } else {
    console.log(MAIN_HELP);
  }

  return 0;
}
