/**
 * The shrine command line program
 */

import { Command, CommanderError, Option } from 'commander';
import { VERSION, isShrineError } from '@shrine/ipc';
import { errorMessage } from '@shrine/storage';
import {
  createAgentCommand,
  createConfigCommand,
  createConvertCommand,
  createDumpCommand,
  createGetCommand,
  createImportCommand,
  createInfoCommand,
  createInitCommand,
  createLsCommand,
  createRmCommand,
  createSetCommand,
} from './commands/index.js';
import type { CliEnvironment } from './context.js';

function forEachCommand(command: Command, fn: (command: Command) => void): void {
  fn(command);
  for (const sub of command.commands) {
    forEachCommand(sub, fn);
  }
}

/**
 * Create and configure the main CLI program. Errors are thrown rather than
 * exiting the process.
 */
export function createProgram(io: CliEnvironment): Command {
  const program = new Command();

  program
    .name('shrine')
    .description('Secrets manager that keeps everything in one encrypted file')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('-p, --password <password>', 'Shrine password; asked for when omitted')
    .option('--path <dir>', 'Folder holding the shrine (default: current directory)')
    .addOption(new Option('--folder <dir>', 'Alias of --path').hideHelp())
    .addHelpText(
      'after',
      `
Examples:
  $ shrine init                     Create a shrine in the current folder
  $ shrine set db/password          Store a secret (value is asked for)
  $ shrine get db/password          Print it
  $ shrine ls '^db/'                List secrets under db/
  $ shrine agent start              Keep the key unlocked for a while
`,
    );

  program.addCommand(createInitCommand(io));
  program.addCommand(createSetCommand(io));
  program.addCommand(createGetCommand(io));
  program.addCommand(createLsCommand(io));
  program.addCommand(createRmCommand(io));
  program.addCommand(createConvertCommand(io));
  program.addCommand(createImportCommand(io));
  program.addCommand(createConfigCommand(io));
  program.addCommand(createInfoCommand(io));
  program.addCommand(createDumpCommand(io));
  program.addCommand(createAgentCommand(io));

  forEachCommand(program, (command) => {
    command.exitOverride();
    command.configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    });
  });

  return program;
}

/**
 * Run one invocation and return its exit code.
 */
export async function runCli(argv: string[], io: CliEnvironment): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (isShrineError(error)) {
      io.stderr.write(`error: ${error.message}\n`);
      return error.exitCode > 0 ? error.exitCode : 1;
    }
    io.stderr.write(`error: ${errorMessage(error)}\n`);
    return 1;
  }
}
