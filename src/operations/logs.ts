import { runStep } from '../runner/process-runner';
import type { Operation } from '../runner/types';

export const LOG_FORMAT = 'table(timestamp,logName,textPayload)';

export const logsOperation: Operation = {
  name: 'logs',
  description: 'View application logs',
  dependencies: [],
  async run(context) {
    const { config } = context;
    context.logger.heading('📜 Fetching Cloud Run logs...');
    await runStep(context, {
      command: config.gcloud,
      args: ['logging', 'read', config.logFilter, `--limit=${config.logLimit}`, `--format=${LOG_FORMAT}`],
    });
  },
};
