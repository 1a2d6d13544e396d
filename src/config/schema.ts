import { z } from 'zod';

export const DEFAULT_GCP_SERVICES = [
  'run.googleapis.com',
  'sqladmin.googleapis.com',
  'cloudbuild.googleapis.com',
  'artifactregistry.googleapis.com',
  'cloudresourcemanager.googleapis.com',
] as const;

export const DEFAULT_CLEAN_PATHS = [
  'outputs',
  '__pycache__',
  'agent/__pycache__',
  'clouds/__pycache__',
  'tests/__pycache__',
  'agent/config/__pycache__',
  'clouds/gcp/__pycache__',
] as const;

const executable = z.string().trim().min(1);
const relativePath = z.string().trim().min(1);

export const deployerConfigSchema = z
  .object({
    python: executable.default('python'),
    pip: executable.default('pip'),
    gcloud: executable.default('gcloud'),
    terraform: executable.default('terraform'),
    /** Overrides the platform's URL opener. */
    opener: executable.optional(),
    requirementsFile: relativePath.default('requirements.txt'),
    envFile: relativePath.default('.env'),
    envTemplate: relativePath.default('.env.example'),
    testsDir: relativePath.default('tests/'),
    agentModule: z
      .string()
      .regex(/^[A-Za-z_][\w]*(\.[A-Za-z_][\w]*)*$/, 'must be a dotted Python module name')
      .default('agent.main'),
    terraformDir: relativePath.default('outputs/terraform'),
    gcpServices: z.array(z.string().trim().min(1)).default(() => [...DEFAULT_GCP_SERVICES]),
    logFilter: z.string().trim().min(1).default('resource.type=cloud_run_revision'),
    logLimit: z.number().int().positive().default(20),
    cleanPaths: z.array(relativePath).default(() => [...DEFAULT_CLEAN_PATHS]),
  })
  .strict();

export type DeployerConfig = z.infer<typeof deployerConfigSchema>;
