/**
 * Command line parsing for the mu0 front-end
 *
 * Usage: mu0 [-s|--step] [--max-steps N] [source.asm]
 */

export interface CliOptions {
  sourcePath?: string;
  step: boolean;
  maxSteps?: number;
  help: boolean;
}

export class UsageError extends Error {
  override readonly name = 'UsageError';
}

/**
 * @param args - arguments after the node and script paths
 * @throws UsageError on an unknown option or a bad value
 */
export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { step: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '-s' || arg === '--step') {
      options.step = true;
    } else if (arg === '-h' || arg === '--help') {
      options.help = true;
    } else if (arg === '--max-steps') {
      if (i + 1 >= args.length) {
        throw new UsageError('--max-steps requires a number');
      }
      const value = args[++i];
      const maxSteps = Number(value);
      if (!/^\d+$/.test(value) || maxSteps <= 0) {
        throw new UsageError(`--max-steps must be a positive integer, got '${value}'`);
      }
      options.maxSteps = maxSteps;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unrecognized option '${arg}'`);
    } else if (options.sourcePath === undefined) {
      options.sourcePath = arg;
    } else {
      throw new UsageError(`Unexpected argument '${arg}'`);
    }
  }

  return options;
}

export function usage(): string {
  return `MU0 emulator

Usage: mu0 [-s|--step] [--max-steps N] [source.asm]

Options:
  -s, --step         Execute one instruction at a time
  --max-steps <n>    Stop run-to-completion after n steps (default: MU0_MAX_STEPS or 100000)
  -h, --help         Show this help message

Without a source file, a menu of sample programs is shown.

Examples:
  mu0 division.asm
  mu0 -s division.asm`;
}
