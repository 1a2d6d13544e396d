import { spawn } from 'child_process';
import { constants } from 'os';
import type { Logger } from '../utils/logger';
import { CommandFailedError } from './errors';
import type { CommandSpec, OperationContext, ProcessRunner } from './types';

/** Shell convention for a command that could not be started. */
export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

const SAFE_ARGUMENT = /^[\w@%+=:,./-]+$/;

function quoteArgument(arg: string): string {
  if (SAFE_ARGUMENT.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Renders a command the way a user would type it in a POSIX shell. Display only. */
export function formatCommandLine(spec: CommandSpec): string {
  return [spec.command, ...spec.args].map(quoteArgument).join(' ');
}

export function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  if (signal !== null) {
    return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
  }
  return 1;
}

export class SpawnProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger) {}

  run(spec: CommandSpec): Promise<number> {
    this.logger.command(formatCommandLine(spec));

    return new Promise<number>((resolve) => {
      const child = spawn(spec.command, spec.args, {
        cwd: spec.cwd ?? process.cwd(),
        env: process.env,
        stdio: 'inherit',
        shell: false,
      });

      child.on('close', (code, signal) => {
        resolve(exitCodeFor(code, signal));
      });

      child.on('error', (error) => {
        this.logger.error(`   Error running ${spec.command}: ${error.message}`);
        resolve(COMMAND_NOT_FOUND_EXIT_CODE);
      });
    });
  }
}

export class DryRunProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger) {}

  async run(spec: CommandSpec): Promise<number> {
    const location = spec.cwd ? ` (in ${spec.cwd})` : '';
    this.logger.command(`[dry-run] ${formatCommandLine(spec)}${location}`);
    return 0;
  }
}

/**
 * Runs one step of an operation in the context's working directory.
 * Throws CommandFailedError on a non-zero exit so the remaining steps are skipped.
 */
export async function runStep(context: OperationContext, spec: CommandSpec): Promise<void> {
  const exitCode = await context.processRunner.run({ ...spec, cwd: spec.cwd ?? context.cwd });
  if (exitCode !== 0) {
    throw new CommandFailedError(formatCommandLine(spec), exitCode);
  }
}
