import { runStep } from '../runner/process-runner';
import type { CommandSpec, Operation, OperationContext, OperationOption } from '../runner/types';

const DEPLOY_DEPENDENCIES = ['install', 'setup'] as const;

const DEPLOY_OPTIONS: readonly OperationOption[] = [
  { flags: '--project <id>', description: 'GCP project ID handed to the deployment agent' },
  { flags: '--region <region>', description: 'GCP region handed to the deployment agent' },
];

/** `python -m <agent>` plus `--auto` and any forwarded project/region. */
export function agentCommand(context: OperationContext, auto: boolean): CommandSpec {
  const args = ['-m', context.config.agentModule];
  if (auto) {
    args.push('--auto');
  }

  const { project, region } = context.options;
  if (typeof project === 'string') {
    args.push('--project', project);
  }
  if (typeof region === 'string') {
    args.push('--region', region);
  }

  return { command: context.config.python, args };
}

export const deployOperation: Operation = {
  name: 'deploy',
  description: 'Start the deployment agent',
  dependencies: DEPLOY_DEPENDENCIES,
  options: DEPLOY_OPTIONS,
  async run(context) {
    context.logger.heading('🤖 Starting deployment agent...');
    context.logger.success('🚀 The agent will prompt for your repository and deploy it to Cloud Run');
    await runStep(context, agentCommand(context, false));
  },
};

export const deployAutoOperation: Operation = {
  name: 'deploy-auto',
  description: 'Start the deployment agent without confirmation prompts',
  dependencies: DEPLOY_DEPENDENCIES,
  options: DEPLOY_OPTIONS,
  async run(context) {
    context.logger.heading('🤖 Starting automated deployment...');
    await runStep(context, agentCommand(context, true));
  },
};
