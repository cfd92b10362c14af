#!/usr/bin/env node

/**
 * calseq CLI entry point.
 */

import { getEnvVarDocumentation } from '../config/env.js';
import { createCliApp } from './app.js';
import { handleFormatCommand } from './commands/format.js';
import { handlePlanCommand } from './commands/plan.js';
import { handleValidateCommand } from './commands/validate.js';
import { getVersionFromPackageJson, handleVersionCommand } from './commands/version.js';
import type { CliCommandHandler } from './types.js';
import { withErrorHandling } from './utils/errorHandling.js';

/**
 * Displays usage information.
 */
function showHelp(): void {
  const envLines = Object.entries(getEnvVarDocumentation())
    .map(([name, doc]) => `  ${name.padEnd(30)} ${doc.description}`)
    .join('\n');

  const helpText = `
calseq v${getVersionFromPackageJson()}

Load, check and plan calibration exposure requests.

USAGE:
  calseq <command> [options]

COMMANDS:
  validate    Check request files
  plan        Show the sequence that would run request files
  format      Print a request file in canonical form
  help        Show this help message
  version     Show version information

OPTIONS:
  --config, -c <path>  Configuration file (default: ./calseq.toml)
  --help, -h           Show help for a command
  --version, -v        Show version information

ENVIRONMENT:
${envLines}

EXAMPLES:
  calseq validate cals/*.yaml
  calseq plan -n 3 --lampsoff cals/broadband.yaml cals/thorium.yaml
  calseq format cals/broadband.yaml
`;
  console.log(helpText);
}

/**
 * Shows error message with help.
 *
 * @param message - The error message to display.
 */
function showError(message: string): void {
  console.error(`Error: ${message}`);
  console.error('\nRun "calseq help" for usage information.');
}

/**
 * Shows help for a specific command.
 *
 * @param commandName - The command name to show help for.
 */
function showHelpForCommand(commandName: string): void {
  const commandHelp = new Map<string, string>([
    [
      'validate',
      `
USAGE: calseq validate <file...> [--strict] [--config <path>]

Parses each request file and checks it against the installed ND filters
and the configured limits. Every file is checked; the command fails if
any file is invalid.

OPTIONS:
  --strict           Treat instrument warnings as failures

EXAMPLES:
  calseq validate cals/broadband.yaml
  calseq validate --strict cals/*.yaml
`,
    ],
    [
      'plan',
      `
USAGE: calseq plan <file...> [options]

Prints, step by step, what running the request files would do: lamp
power, warm-up, keyword writes and exposures. Nothing is sent to the
instrument.

OPTIONS:
  -n, --repeat <count>   Repeat the whole set of files (default: sequence.repeat_count)
  --lampsoff, --off      Power lamps off at the end
  --noexp                Leave out exposures
  --json                 Print the plan as JSON

EXAMPLES:
  calseq plan cals/broadband.yaml
  calseq plan -n 2 --off cals/broadband.yaml cals/thorium.yaml
`,
    ],
    [
      'format',
      `
USAGE: calseq format <file>

Prints the request with every field, in canonical order.

EXAMPLES:
  calseq format cals/broadband.yaml > cals/broadband.canonical.yaml
`,
    ],
  ]);

  const help = commandHelp.get(commandName);
  if (help !== undefined) {
    console.log(help);
  } else {
    console.error(`Unknown command: ${commandName}`);
    console.error('\nRun "calseq help" to see all available commands.');
  }
}

/**
 * Runs a context-based command handler with standard error handling.
 */
function handleCommandWithContext(
  command: string,
  handler: CliCommandHandler,
  commandArgs: string[]
): void {
  withErrorHandling(async () => {
    const context = await createCliApp(commandArgs, { command });
    return await handler(context);
  });
}

/**
 * Main CLI entry point.
 */
function main(): void {
  const args = process.argv.slice(2);
  const command = args[0] ?? '';
  const commandArgs = args.slice(1);

  if (!command) {
    showHelp();
    process.exit(0);
  }

  switch (command) {
    case 'help':
    case '--help':
    case '-h':
      if (commandArgs[0] !== undefined) {
        showHelpForCommand(commandArgs[0]);
      } else {
        showHelp();
      }
      process.exit(0);
      break;

    case 'version':
    case '--version':
    case '-v':
      withErrorHandling(() => handleVersionCommand());
      break;

    case 'validate':
    case 'plan':
    case 'format': {
      if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
        showHelpForCommand(command);
        process.exit(0);
      }
      const handler: CliCommandHandler =
        command === 'validate'
          ? handleValidateCommand
          : command === 'plan'
            ? handlePlanCommand
            : handleFormatCommand;
      handleCommandWithContext(command, handler, commandArgs);
      break;
    }

    default:
      showError(`Unknown command: ${command}`);
      process.exit(1);
  }
}

try {
  main();
} catch (error) {
  console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
}
