import { DependencyCycleError, DuplicateOperationError, UnknownOperationError } from './errors';
import type { Operation } from './types';

export class OperationRegistry {
  private readonly operations = new Map<string, Operation>();

  constructor(operations: Iterable<Operation> = []) {
    for (const operation of operations) {
      this.register(operation);
    }
  }

  register(operation: Operation): void {
    if (this.operations.has(operation.name)) {
      throw new DuplicateOperationError(operation.name);
    }
    this.operations.set(operation.name, operation);
  }

  has(name: string): boolean {
    return this.operations.has(name);
  }

  get(name: string): Operation {
    const operation = this.operations.get(name);
    if (!operation) {
      throw new UnknownOperationError(name);
    }
    return operation;
  }

  /** Operations in registration order. */
  list(): Operation[] {
    return Array.from(this.operations.values());
  }

  /** Resolves every operation's dependencies, throwing on unknown names or cycles. */
  validate(): void {
    for (const name of this.operations.keys()) {
      resolveExecutionOrder(this, name);
    }
  }
}

/**
 * Depth-first post-order over the dependency graph: each dependency once, in
 * declared order, followed by the requested operation itself.
 */
export function resolveExecutionOrder(registry: OperationRegistry, name: string): Operation[] {
  const order: Operation[] = [];
  const done = new Set<string>();
  const visiting: string[] = [];

  const visit = (operationName: string, requiredBy?: string): void => {
    if (done.has(operationName)) {
      return;
    }

    const cycleStart = visiting.indexOf(operationName);
    if (cycleStart !== -1) {
      throw new DependencyCycleError([...visiting.slice(cycleStart), operationName]);
    }

    if (!registry.has(operationName)) {
      throw new UnknownOperationError(operationName, requiredBy);
    }
    const operation = registry.get(operationName);

    visiting.push(operationName);
    for (const dependency of operation.dependencies) {
      visit(dependency, operationName);
    }
    visiting.pop();

    done.add(operationName);
    order.push(operation);
  };

  visit(name);
  return order;
}
