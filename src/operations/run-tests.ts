import { runStep } from '../runner/process-runner';
import type { Operation } from '../runner/types';

// install and setup are expected to have run; not enforced
export const testOperation: Operation = {
  name: 'test',
  description: 'Run the Python test suite',
  dependencies: [],
  async run(context) {
    const { config, logger } = context;
    logger.heading('🧪 Running tests...');
    await runStep(context, { command: config.python, args: ['-m', 'pytest', config.testsDir, '-v'] });
    logger.success('✓ Tests completed');
  },
};
