import { runStep } from '../runner/process-runner';
import type { Operation } from '../runner/types';

export const installOperation: Operation = {
  name: 'install',
  description: 'Install Python dependencies',
  dependencies: [],
  async run(context) {
    const { config, logger } = context;
    logger.heading('📦 Installing dependencies...');
    await runStep(context, { command: config.pip, args: ['install', '-r', config.requirementsFile] });
    logger.success('✓ Dependencies installed');
  },
};
