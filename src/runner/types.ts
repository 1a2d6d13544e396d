import type { DeployerConfig } from '../config/schema';
import type { Logger } from '../utils/logger';

/** One external process invocation. Arguments are passed as-is, never through a shell. */
export interface CommandSpec {
  command: string;
  args: string[];
  cwd?: string;
}

export interface ProcessRunner {
  /** Runs the process to completion and resolves its exit code. */
  run(spec: CommandSpec): Promise<number>;
}

/** Source of interactive values (a terminal prompt in the CLI, scripted answers in tests). */
export interface InputProvider {
  ask(message: string): Promise<string>;
}

export interface OperationOption {
  flags: string;
  description: string;
}

export type OptionValues = Record<string, string | boolean | undefined>;

export interface OperationContext {
  cwd: string;
  config: DeployerConfig;
  processRunner: ProcessRunner;
  input: InputProvider;
  logger: Logger;
  platform: NodeJS.Platform;
  dryRun: boolean;
  options: OptionValues;
}

export interface Operation {
  name: string;
  description: string;
  /** Operations that must complete successfully first, in order. */
  dependencies: readonly string[];
  options?: readonly OperationOption[];
  run(context: OperationContext): Promise<void>;
}
