import type { Operation } from '../runner/types';

export const COST_FIGURES = [
  'First 2 million requests: Free',
  'Memory: $0.00002400 per GiB-second',
  'CPU: $0.00002400 per vCPU-second',
  'Cloud SQL PostgreSQL (db-f1-micro): ~$8/month',
  'Estimated monthly cost for 2 services: ~$15-25',
] as const;

export const costEstimateOperation: Operation = {
  name: 'cost-estimate',
  description: 'Show estimated Cloud Run costs',
  dependencies: [],
  async run({ logger }) {
    logger.heading('💰 Cloud Run Cost Estimation:');
    for (const figure of COST_FIGURES) {
      logger.plain(`  • ${figure}`);
    }
  },
};
