// Central registry of every operation, in help-listing order
import { OperationRegistry } from '../runner/registry';
import type { Operation } from '../runner/types';
import { cleanOperation } from './clean';
import { costEstimateOperation } from './cost-estimate';
import { deployAutoOperation, deployOperation } from './deploy';
import { destroyOperation } from './destroy';
import { gcpAuthOperation } from './gcp-auth';
import { installOperation } from './install';
import { logsOperation } from './logs';
import { monitorOperation } from './monitor';
import { setupOperation } from './setup';
import { statusOperation } from './status';
import { testOperation } from './run-tests';

export const OPERATIONS: readonly Operation[] = [
  installOperation,
  setupOperation,
  gcpAuthOperation,
  testOperation,
  deployOperation,
  deployAutoOperation,
  destroyOperation,
  monitorOperation,
  logsOperation,
  statusOperation,
  cleanOperation,
  costEstimateOperation,
];

export function createOperationRegistry(operations: readonly Operation[] = OPERATIONS): OperationRegistry {
  const registry = new OperationRegistry(operations);
  registry.validate();
  return registry;
}
