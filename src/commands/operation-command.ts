import { Command } from 'commander';
import { loadConfig } from '../config/loader';
import { Dispatcher } from '../runner/dispatcher';
import { describeError } from '../runner/errors';
import type { InputProvider, Operation, OptionValues, ProcessRunner } from '../runner/types';
import type { Logger } from '../utils/logger';

/** Everything a command needs from the outside world. */
export interface CommandEnvironment {
  dispatcher: Dispatcher;
  cwd: string;
  platform: NodeJS.Platform;
  env: NodeJS.ProcessEnv;
  logger: Logger;
  input: InputProvider;
  createProcessRunner(dryRun: boolean): ProcessRunner;
  setExitCode(code: number): void;
}

function toOptionValues(raw: Record<string, unknown>): OptionValues {
  const values: OptionValues = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string' || typeof value === 'boolean') {
      values[key] = value;
    }
  }
  return values;
}

function describeOperation(operation: Operation): string {
  if (operation.dependencies.length === 0) {
    return operation.description;
  }
  return `${operation.description} (runs ${operation.dependencies.join(', ')} first)`;
}

export function createOperationCommand(operation: Operation, environment: CommandEnvironment): Command {
  const command = new Command(operation.name).description(describeOperation(operation));

  for (const option of operation.options ?? []) {
    command.option(option.flags, option.description);
  }

  return command.action(async (_options: unknown, invoked: Command) => {
    const options = toOptionValues(invoked.optsWithGlobals());
    const dryRun = options.dryRun === true;
    const { logger } = environment;

    try {
      const config = loadConfig(environment.cwd, environment.env);
      const exitCode = await environment.dispatcher.run(operation.name, {
        cwd: environment.cwd,
        config,
        processRunner: environment.createProcessRunner(dryRun),
        input: environment.input,
        logger,
        platform: environment.platform,
        dryRun,
        options,
      });
      environment.setExitCode(exitCode);
    } catch (error) {
      logger.error(`❌ ${describeError(error)}`);
      environment.setExitCode(1);
    }
  });
}
