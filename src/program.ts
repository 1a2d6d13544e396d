import { Command } from 'commander';
import packageJson from '../package.json';
import { createOperationCommand, type CommandEnvironment } from './commands';
import type { OperationRegistry } from './runner/registry';

export function createProgram(registry: OperationRegistry, environment: CommandEnvironment): Command {
  const program = new Command();

  program
    .name('crd')
    .description('Cloud Run deployer - install, authenticate, test, deploy and tear down 🚀')
    .version(packageJson.version, '-v, --version', 'Output the current version')
    .helpOption('-h, --help', 'Display help for command')
    .addHelpCommand('help [operation]', 'Display help for an operation')
    .option('--dry-run', 'Print the commands an operation would run without running them');

  // One subcommand per operation
  for (const operation of registry.list()) {
    program.addCommand(createOperationCommand(operation, environment));
  }

  // Default action when no operation is given
  program.action((_options: unknown, invoked: Command) => {
    const [unknown] = invoked.args;
    if (unknown !== undefined) {
      program.error(`error: unknown operation '${unknown}'`);
    }
    program.outputHelp();
  });

  return program;
}
