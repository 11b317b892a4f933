import readline from 'node:readline';
import { AppError, errorMessage, getExitCode } from '../../utils/errors';
import { formatReport } from './formatReport';
import { UptimeReporter } from './UptimeReporter';

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
  /** Ask for a line of input; only used when no monitor name is given. */
  prompt(question: string): Promise<string>;
}

const RULE = '=============================================';

/**
 * Line prompt over a pair of streams. Resolves '' when the input closes
 * before a line arrives (EOF, piped input, no terminal).
 */
export function createPrompt(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): (question: string) => Promise<string> {
  return question => new Promise<string>(resolve => {
    const rl = readline.createInterface({ input, output });
    rl.once('close', () => resolve(''));
    rl.question(question, answer => {
      resolve(answer);
      rl.close();
    });
  });
}

async function monitorListing(reporter: UptimeReporter): Promise<string> {
  const monitors = await reporter.listMonitors();
  if (monitors.length === 0) {
    return '  (no monitors found)';
  }
  return monitors.map(name => `  - ${name}`).join('\n');
}

async function printUsage(reporter: UptimeReporter, io: CliIO): Promise<void> {
  io.out([
    'Usage: downornot-uptime [monitor_name]',
    '',
    'If monitor_name is not provided, you will be prompted to enter it.',
    '',
    'Available monitors:',
    await monitorListing(reporter),
  ].join('\n'));
}

/**
 * Uptime reporter command line. Returns the process exit code.
 *
 *   downornot-uptime            prompt for a monitor name
 *   downornot-uptime <name>     report for <name>
 *   downornot-uptime --help     usage and known monitors
 */
export async function runUptimeCli(args: string[], reporter: UptimeReporter, io: CliIO): Promise<number> {
  let name: string;

  if (args.length > 0) {
    if (args[0] === '-h' || args[0] === '--help') {
      await printUsage(reporter, io);
      return 0;
    }
    name = args[0];
  } else {
    io.out([
      RULE,
      '   DownOrNot - Uptime Calculator',
      RULE,
      '',
      'Available monitors:',
      await monitorListing(reporter),
      '',
    ].join('\n'));
    name = await io.prompt('Enter monitor name: ');
  }

  try {
    const report = await reporter.report(name);
    io.out(formatReport(name.trim(), report));
    return 0;
  } catch (error) {
    if (!(error instanceof AppError)) {
      throw error;
    }
    io.err(`ERROR: ${errorMessage(error)}`);
    return getExitCode(error);
  }
}
