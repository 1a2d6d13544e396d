export class CommandFailedError extends Error {
  constructor(
    readonly commandLine: string,
    readonly exitCode: number,
  ) {
    super(`Command exited with code ${exitCode}: ${commandLine}`);
    this.name = 'CommandFailedError';
  }
}

export class UnknownOperationError extends Error {
  constructor(
    readonly operationName: string,
    readonly requiredBy?: string,
  ) {
    super(
      requiredBy
        ? `Operation "${requiredBy}" depends on unknown operation "${operationName}"`
        : `Unknown operation "${operationName}"`,
    );
    this.name = 'UnknownOperationError';
  }
}

export class DuplicateOperationError extends Error {
  constructor(readonly operationName: string) {
    super(`Operation "${operationName}" is already registered`);
    this.name = 'DuplicateOperationError';
  }
}

export class DependencyCycleError extends Error {
  /** The offending path; first and last entries are the same operation. */
  constructor(readonly cycle: readonly string[]) {
    super(`Dependency cycle: ${cycle.join(' -> ')}`);
    this.name = 'DependencyCycleError';
  }
}

export class ConfigError extends Error {
  constructor(
    readonly configPath: string,
    readonly issues: readonly string[],
  ) {
    super(`Invalid configuration in ${configPath}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
