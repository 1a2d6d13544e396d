// Central export point for all commands
export { createOperationCommand } from './operation-command';
export type { CommandEnvironment } from './operation-command';
