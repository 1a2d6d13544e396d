import * as path from 'path';
import { runStep } from '../runner/process-runner';
import type { Operation } from '../runner/types';
import { isDirectory } from '../utils/fs';

export const destroyOperation: Operation = {
  name: 'destroy',
  description: 'Destroy deployed infrastructure',
  dependencies: [],
  async run(context) {
    const { config, logger } = context;
    logger.heading('💥 Destroying Cloud Run infrastructure...', 'danger');

    const terraformDir = path.resolve(context.cwd, config.terraformDir);
    if (!isDirectory(terraformDir)) {
      logger.warn('No terraform outputs found - nothing to destroy');
      return;
    }

    await runStep(context, { command: config.terraform, args: ['destroy', '-auto-approve'], cwd: terraformDir });
    logger.success('✓ Infrastructure destroyed');
  },
};
