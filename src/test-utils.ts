import { mkdirSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseConfig } from './config/loader';
import type { DeployerConfig } from './config/schema';
import { formatCommandLine } from './runner/process-runner';
import type { CommandSpec, InputProvider, OperationContext, ProcessRunner } from './runner/types';
import type { Logger } from './utils/logger';

export function makeTmpDir(): string {
  const dir = join(tmpdir(), `crd-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function testConfig(overrides: Record<string, unknown> = {}): DeployerConfig {
  return parseConfig(overrides, 'test-config.json');
}

/** Records every command instead of spawning it. Exit codes come from `exitCodes`. */
export class RecordingProcessRunner implements ProcessRunner {
  readonly commands: CommandSpec[] = [];

  constructor(private readonly exitCodes: (spec: CommandSpec) => number = () => 0) {}

  async run(spec: CommandSpec): Promise<number> {
    this.commands.push(spec);
    return this.exitCodes(spec);
  }

  commandLines(): string[] {
    return this.commands.map((spec) => formatCommandLine(spec));
  }
}

export class ScriptedInputProvider implements InputProvider {
  readonly questions: string[] = [];
  private readonly answers: string[];

  constructor(answers: string[] = []) {
    this.answers = [...answers];
  }

  async ask(message: string): Promise<string> {
    this.questions.push(message);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`No scripted answer for "${message}"`);
    }
    return answer;
  }
}

export type LogLevel = keyof Logger;

export interface LogEntry {
  level: LogLevel;
  message: string;
}

export interface RecordingLogger extends Logger {
  readonly entries: LogEntry[];
  messages(level?: LogLevel): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };

  return {
    entries,
    messages: (level) => entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.message),
    heading: record('heading'),
    success: record('success'),
    warn: record('warn'),
    error: record('error'),
    hint: record('hint'),
    command: record('command'),
    plain: record('plain'),
  };
}

export function createTestContext(cwd: string, overrides: Partial<OperationContext> = {}): OperationContext {
  return {
    cwd,
    config: testConfig(),
    processRunner: new RecordingProcessRunner(),
    input: new ScriptedInputProvider(),
    logger: createRecordingLogger(),
    platform: 'linux',
    dryRun: false,
    options: {},
    ...overrides,
  };
}
