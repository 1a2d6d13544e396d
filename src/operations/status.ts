import { runStep } from '../runner/process-runner';
import type { Operation } from '../runner/types';

export const STATUS_FORMAT = 'table(service.name,status.url,status.conditions[0].type)';

export const statusOperation: Operation = {
  name: 'status',
  description: 'Check deployment status',
  dependencies: [],
  async run(context) {
    context.logger.heading('🔎 Cloud Run services status:');
    await runStep(context, {
      command: context.config.gcloud,
      args: ['run', 'services', 'list', '--platform=managed', `--format=${STATUS_FORMAT}`],
    });
  },
};
