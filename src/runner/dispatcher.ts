import { CommandFailedError } from './errors';
import { OperationRegistry, resolveExecutionOrder } from './registry';
import type { Operation, OperationContext } from './types';

export class Dispatcher {
  constructor(private readonly registry: OperationRegistry) {}

  plan(name: string): Operation[] {
    return resolveExecutionOrder(this.registry, name);
  }

  /**
   * Runs the operation after its dependencies and resolves the exit code of the
   * last attempted step. A failed command stops everything queued after it.
   */
  async run(name: string, context: OperationContext): Promise<number> {
    for (const operation of this.plan(name)) {
      try {
        await operation.run(context);
      } catch (error) {
        if (error instanceof CommandFailedError) {
          context.logger.error(`❌ ${operation.name} failed. ${error.message}`);
          return error.exitCode;
        }
        throw error;
      }
    }
    return 0;
  }
}
