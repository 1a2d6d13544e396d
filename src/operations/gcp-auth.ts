import { runStep } from '../runner/process-runner';
import type { Operation } from '../runner/types';

export const PROJECT_ID_PROMPT = 'Enter your GCP project ID:';

export const gcpAuthOperation: Operation = {
  name: 'gcp-auth',
  description: 'Log in to Google Cloud, select a project and enable the required APIs',
  dependencies: [],
  async run(context) {
    const { config, logger } = context;
    logger.heading('🔐 Setting up GCP authentication...');

    await runStep(context, { command: config.gcloud, args: ['auth', 'login'] });

    const projectId = await context.input.ask(PROJECT_ID_PROMPT);
    await runStep(context, { command: config.gcloud, args: ['config', 'set', 'project', projectId] });

    for (const service of config.gcpServices) {
      await runStep(context, { command: config.gcloud, args: ['services', 'enable', service] });
    }

    logger.success('✓ GCP services enabled');
  },
};
