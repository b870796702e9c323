/**
 * hmi-sim CLI - run the page navigation demos in a terminal
 *
 * Usage:
 *   hmi-sim run [--demo <name>] [--tick <ms>] [--script <keys>] [--max-ticks <n>]
 *   hmi-sim keys
 *
 * Commands:
 *   run    Run a demo page tree until the shutdown page expires
 *   keys   Show the key bindings of the simulated buttons
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigurationError, createLogger } from 'multi-page-hmi';

import { ConfigManager, DEMO_NAMES } from '../config.js';
import { buildDemo } from '../demos/index.js';
import { TerminalDisplay, type OutputStream } from '../display/TerminalDisplay.js';
import { KeyboardInput, type KeyboardStream } from '../input/KeyboardInput.js';
import { ScriptedInput } from '../input/ScriptedInput.js';
import { createKeymap, describeKeymap } from '../input/keymap.js';
import type { InteractionSource } from '../input/types.js';
import { RunLoop } from '../runtime/RunLoop.js';

const VERSION = '0.1.0';

export interface CliStreams {
  stdout: OutputStream;
  stdin: KeyboardStream;
}

interface RunCommandOptions {
  demo?: string;
  tick?: string;
  script?: string;
  maxTicks?: string;
  logLevel?: string;
  clear: boolean;
}

export function createCLI(streams: CliStreams = { stdout: process.stdout, stdin: process.stdin }): Command {
  const program = new Command();

  program
    .name('hmi-sim')
    .description('Simulate a multi page HMI with a handful of buttons in the terminal')
    .version(VERSION);

  // ============================================================================
  // Run Command
  // ============================================================================

  program
    .command('run')
    .description('Run a demo page tree')
    .option('-d, --demo <name>', `Demo to run (${DEMO_NAMES.join(', ')})`)
    .option('-t, --tick <ms>', 'Milliseconds between ticks')
    .option('-s, --script <keys>', 'Replay keys instead of reading the keyboard, one per tick')
    .option('-m, --max-ticks <n>', 'Stop after this many ticks')
    .option('--log-level <level>', 'Log level (trace, debug, info, warn, error, fatal, silent)')
    .option('--no-clear', 'Do not clear the screen between frames')
    .action(async (options: RunCommandOptions) => {
      let config: ConfigManager;
      try {
        config = ConfigManager.fromEnv();
        config.update(toOverrides(options, config));
      } catch (error) {
        if (error instanceof ConfigurationError) {
          console.error(chalk.red(error.message));
          for (const issue of error.issues) {
            console.error(chalk.gray(`  ${issue}`));
          }
          process.exitCode = 1;
          return;
        }
        throw error;
      }

      const settings = config.getConfig();
      const logger = createLogger({ name: 'hmi-simulator', ...settings.logging });
      const keymap = createKeymap(settings.keymap);
      const input: InteractionSource =
        options.script !== undefined
          ? new ScriptedInput(options.script, keymap)
          : new KeyboardInput(streams.stdin, keymap);

      const display = new TerminalDisplay({ stream: streams.stdout, clear: options.clear });
      const manager = buildDemo(settings.demo, display, {
        startupTicks: settings.startupTicks,
        shutdownTicks: settings.shutdownTicks,
        logger,
      });
      const loop = new RunLoop(manager, input, {
        tickMs: settings.tickMs,
        maxTicks: settings.maxTicks,
        logger,
      });

      const onSignal = (): void => loop.stop();
      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);

      try {
        const summary = await loop.run();
        console.log(chalk.gray(`\nStopped after ${summary.ticks} ticks (${summary.reason})`));
        if (summary.reason === 'error') {
          console.error(chalk.red(summary.error?.message ?? 'Page update failed'));
          process.exitCode = 1;
        }
      } finally {
        process.removeListener('SIGINT', onSignal);
        process.removeListener('SIGTERM', onSignal);
        manager.dispose();
      }
    });

  // ============================================================================
  // Keys Command
  // ============================================================================

  program
    .command('keys')
    .description('Show the key bindings')
    .action(() => {
      const keymap = createKeymap(ConfigManager.fromEnv().get('keymap'));
      console.log(chalk.bold('\nKey bindings\n'));
      for (const line of describeKeymap(keymap)) {
        console.log(`  ${line}`);
      }
      console.log(`  ${'q'.padEnd(6)}${chalk.yellow('stop')} (also ctrl-c)`);
    });

  return program;
}

function toOverrides(options: RunCommandOptions, config: ConfigManager): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (options.demo !== undefined) overrides.demo = options.demo;
  if (options.tick !== undefined) overrides.tickMs = options.tick;
  if (options.maxTicks !== undefined) overrides.maxTicks = options.maxTicks;
  if (options.logLevel !== undefined) overrides.logging = { ...config.get('logging'), level: options.logLevel };
  return overrides;
}

// ============================================================================
// Main Entry Point
// ============================================================================

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createCLI();
  await program.parseAsync(argv);
}

export default main;
