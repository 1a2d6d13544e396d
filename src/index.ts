#!/usr/bin/env node

import { createOperationRegistry } from './operations';
import { createProgram } from './program';
import { Dispatcher } from './runner/dispatcher';
import { describeError } from './runner/errors';
import { DryRunProcessRunner, SpawnProcessRunner } from './runner/process-runner';
import { InquirerInputProvider } from './runner/prompter';
import { createConsoleLogger } from './utils/logger';

const logger = createConsoleLogger();
const registry = createOperationRegistry();

const program = createProgram(registry, {
  dispatcher: new Dispatcher(registry),
  cwd: process.cwd(),
  platform: process.platform,
  env: process.env,
  logger,
  input: new InquirerInputProvider(),
  createProcessRunner: (dryRun) => (dryRun ? new DryRunProcessRunner(logger) : new SpawnProcessRunner(logger)),
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(`❌ ${describeError(error)}`);
  process.exitCode = 1;
});
