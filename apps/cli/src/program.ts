/**
 * Program Assembly
 *
 * The umbrella `eac-fisheye` program and the single-command programs
 * behind the per-command binaries share the same registration functions.
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { registerBatch } from './commands/batch.js';
import { registerCheck } from './commands/check.js';
import { registerConvert } from './commands/convert.js';
import { registerMask } from './commands/mask.js';

export const VERSION = '0.1.0';

export type CommandRegistrar = (command: Command) => Command;

export function createProgram(): Command {
  const program = new Command();

  program
    .name('eac-fisheye')
    .description('Convert EAC 360° video to 1408x704 dual fisheye')
    .version(VERSION);

  registerConvert(program.command('convert'));
  registerMask(program.command('mask'));
  registerBatch(program.command('batch'));
  registerCheck(program.command('check'));

  return program;
}

/**
 * A program whose root is the command itself (eac-convert <input> <output>)
 */
export function createStandaloneProgram(name: string, register: CommandRegistrar): Command {
  return register(new Command(name).version(VERSION));
}

/**
 * Parse argv and run; usage errors exit with 1, help and version with 0
 */
export async function runProgram(program: Command, argv: string[] = process.argv): Promise<void> {
  program.exitOverride();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.code === 'commander.unknownCommand') {
        console.log('Run', chalk.cyan(`${program.name()} --help`), 'for available commands');
      }
      process.exitCode = error.exitCode === 0 ? 0 : 1;
      return;
    }
    throw error;
  }
}
