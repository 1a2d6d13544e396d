import * as fs from 'fs';
import * as path from 'path';
import type { Operation, OperationContext } from '../runner/types';
import { isFile } from '../utils/fs';

const BUNDLED_TEMPLATE_NAME = 'env.example';

/**
 * The template shipped with the CLI. Sources live in src/templates; a build
 * under dist/ falls back to them when the templates were not copied.
 */
export function findBundledTemplate(): string | undefined {
  const candidates = [
    path.join(__dirname, '..', 'templates', BUNDLED_TEMPLATE_NAME),
    path.join(__dirname, '..', '..', '..', 'src', 'templates', BUNDLED_TEMPLATE_NAME),
  ];
  return candidates.find((candidate) => isFile(candidate));
}

function resolveTemplate(context: OperationContext): string | undefined {
  const workspaceTemplate = path.resolve(context.cwd, context.config.envTemplate);
  if (isFile(workspaceTemplate)) {
    return workspaceTemplate;
  }
  const bundled = findBundledTemplate();
  if (bundled) {
    context.logger.hint(`   ${context.config.envTemplate} not found, using the bundled template`);
  }
  return bundled;
}

export const setupOperation: Operation = {
  name: 'setup',
  description: 'Create the .env file from its template',
  dependencies: [],
  async run(context) {
    const { config, logger } = context;
    logger.heading('🔧 Setting up environment...');

    const envPath = path.resolve(context.cwd, config.envFile);
    if (fs.existsSync(envPath)) {
      logger.warn(`✓ ${config.envFile} file already exists`);
    } else {
      const template = resolveTemplate(context);
      if (!template) {
        logger.error(`❌ No ${config.envTemplate} template found. Create ${config.envFile} by hand.`);
      } else if (context.dryRun) {
        logger.command(`[dry-run] copy ${template} -> ${config.envFile}`);
      } else {
        fs.copyFileSync(template, envPath, fs.constants.COPYFILE_EXCL);
        logger.success(`✓ Created ${config.envFile} file - please configure your GCP credentials`);
      }
    }

    logger.warn('Please make sure you have Google Cloud SDK installed and authenticated');
  },
};
