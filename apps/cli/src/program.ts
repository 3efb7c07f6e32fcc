/**
 * The `gabi` command: flags in, exit code out.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { CLIENT_DEFAULTS, ConfigurationError, STDIN_SENTINEL, runInvocation, type RawInputs } from '@gabi/core';
import { EXIT_CODE_SERVICE, EXIT_CODE_SUCCESS, errorCode, isCommanderExit, toExitCode } from './errors.js';
import { printError, printErrorLine, type CliIo, type OutputOptions } from './output.js';

export const VERSION = '0.1.0';

export type CliOptions = {
  url?: string;
  token?: string;
  query?: string;
  queryFile?: string;
  output?: string;
  sep: string;
  csv: boolean;
  ping: boolean;
  timeoutMs: number;
  quiet: boolean;
  debug: boolean;
};

type RunHandler = (options: CliOptions, command: Command) => Promise<void>;

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/** Shells make a literal tab awkward to type, so `\t` is accepted for one. */
export function parseSeparator(value: string): string {
  return value === '\\t' ? '\t' : value;
}

export function toRawInputs(options: CliOptions): RawInputs {
  return {
    url: options.url,
    token: options.token,
    query: options.query,
    queryFile: options.queryFile,
    output: options.output,
    separator: options.sep,
    csv: options.csv,
    ping: options.ping,
    timeoutMs: options.timeoutMs,
    quiet: options.quiet,
    debug: options.debug,
  };
}

export function buildProgram(io: CliIo, onRun: RunHandler): Command {
  const program = new Command();

  program
    .name('gabi')
    .description('Run a SQL query against a remote query service and print the result')
    .option('-u, --url <url>', `Service URL (falls back to $${CLIENT_DEFAULTS.urlEnv})`)
    .option('-t, --token <token>', `Bearer token (falls back to $${CLIENT_DEFAULTS.tokenEnv})`)
    .option('-q, --query <sql>', `SQL statement to run; "${STDIN_SENTINEL}" reads it from stdin`)
    .option('-Q, --query-file <path>', 'Read the SQL statement from a file (overrides --query)')
    .option('-o, --output <path>', 'Write the result to a file instead of stdout')
    .option('--sep <separator>', 'Field separator for CSV output', parseSeparator, CLIENT_DEFAULTS.separator)
    .option('--no-csv', 'Write the result rows as one JSON document')
    .option('--ping', 'Check that the service is available, then exit', false)
    .option('--timeout-ms <n>', 'Per-request timeout in milliseconds', parsePositiveInt, CLIENT_DEFAULTS.timeoutMs)
    .option('--quiet', 'Suppress informational notes', false)
    .option('--debug', 'Trace requests and show error details', false)
    .helpOption('-h, --help', 'display help')
    .version(VERSION, '-v, --version', 'Show version number')
    .showHelpAfterError('(run with --help for usage)')
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    })
    .exitOverride()
    .action(async function (this: Command) {
      await onRun(this.opts<CliOptions>(), this);
    });

  program.addHelpText(
    'after',
    `
Examples:
  gabi -q "select 1;"
  gabi -Q report.sql -o report.csv --sep ,
  echo "select 1;" | gabi -q - --no-csv
  gabi --ping
`,
  );

  return program;
}

async function execute(options: CliOptions, command: Command, io: CliIo): Promise<number> {
  const output: OutputOptions = { debug: options.debug };
  try {
    const result = await runInvocation(toRawInputs(options), {
      stdin: io.stdin,
      stdout: io.stdout,
      env: io.env,
      writeLog: (line) => {
        io.stderr.write(line);
      },
      dispatcher: io.dispatcher,
    });
    if (result.ok) return EXIT_CODE_SUCCESS;

    printError(result.error, output, io);
    if (result.error instanceof ConfigurationError) {
      printErrorLine('', io);
      io.stderr.write(command.helpInformation());
    }
    return toExitCode(result.error);
  } catch (error: unknown) {
    printError(error, output, io);
    return EXIT_CODE_SERVICE;
  }
}

/** Parse argv (including the node and script entries) and run once. */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  let exitCode: number = EXIT_CODE_SUCCESS;
  const program = buildProgram(io, async (options, command) => {
    exitCode = await execute(options, command, io);
  });

  try {
    await program.parseAsync(argv);
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // commander has already written its own message
      if (!isCommanderExit(error) && program.opts<CliOptions>().debug) {
        printErrorLine(`Code: ${errorCode(error)}`, io);
      }
      return toExitCode(error);
    }
    throw error;
  }
  return exitCode;
}
