import { runStep } from '../runner/process-runner';
import type { Operation } from '../runner/types';
import { openUrlCommand } from '../utils/browser';
import { PROJECT_ID_PROMPT } from './gcp-auth';

export const CLOUD_RUN_CONSOLE_URL = 'https://console.cloud.google.com/run';

export function dashboardUrl(projectId: string): string {
  return `${CLOUD_RUN_CONSOLE_URL}?project=${encodeURIComponent(projectId)}`;
}

export const monitorOperation: Operation = {
  name: 'monitor',
  description: 'Open the Cloud Run monitoring dashboard',
  dependencies: [],
  async run(context) {
    context.logger.heading('📊 Opening Cloud Run dashboard...');

    const projectId = await context.input.ask(PROJECT_ID_PROMPT);
    const url = dashboardUrl(projectId);
    context.logger.hint(`   ${url}`);

    await runStep(context, openUrlCommand(url, context.platform, context.config.opener));
  },
};
