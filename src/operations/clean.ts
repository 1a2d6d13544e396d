import * as fs from 'fs';
import * as path from 'path';
import { describeError } from '../runner/errors';
import type { Operation } from '../runner/types';
import { isInside } from '../utils/fs';

export const cleanOperation: Operation = {
  name: 'clean',
  description: 'Clean generated files',
  dependencies: [],
  async run(context) {
    const { config, logger } = context;
    logger.heading('🧹 Cleaning generated files...');

    for (const relativePath of config.cleanPaths) {
      const target = path.resolve(context.cwd, relativePath);
      if (!isInside(context.cwd, target)) {
        logger.warn(`⚠️  Skipping ${relativePath}: outside the workspace`);
        continue;
      }

      if (context.dryRun) {
        logger.command(`[dry-run] rm -rf ${relativePath}`);
        continue;
      }

      try {
        fs.rmSync(target, { recursive: true, force: true });
        logger.command(`rm -rf ${relativePath}`);
      } catch (error) {
        logger.warn(`⚠️  Could not remove ${relativePath}: ${describeError(error)}`);
      }
    }

    logger.success('✓ Clean completed');
  },
};
