import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, isAbsolute, join, normalize, sep } from 'node:path';
import { z } from 'zod';
import type { LakehouseClient, RunParameterValue } from '../clients/lakehouse-client.js';
import { DEFAULT_CLIENT_TIMEOUT_SECONDS } from '../constants.js';
import { ToolArgumentError } from '../errors.js';
import type { GuardedTarget } from '../validators/branch-guard.js';
import { defineLakehouseTool } from './types.js';

export const PROJECT_MANIFEST = 'bauplan_project.yml';

const runShape = {
  ref: z.string().min(1).describe('Branch or ref to run against'),
  namespace: z.string().optional().describe('Namespace to run in (defaults to the project namespace)'),
  parameters: z
    .record(z.string(), z.union([z.string(), z.number(), z.boolean()]))
    .optional()
    .describe('Template parameters; values must be strings, numbers or booleans'),
  dry_run: z.boolean().default(false).describe('Run without materializing models'),
  client_timeout: z.number().int().positive().default(DEFAULT_CLIENT_TIMEOUT_SECONDS).describe('Timeout in seconds'),
};

interface RunArgs {
  ref: string;
  namespace?: string;
  parameters?: Record<string, RunParameterValue>;
  dry_run: boolean;
  client_timeout: number;
}

/** A dry run writes nothing, so it may target any ref. */
function runTargets(args: RunArgs): GuardedTarget[] {
  return args.dry_run ? [] : [{ argument: 'ref', ref: args.ref }];
}

async function runProject(client: LakehouseClient, projectDir: string, args: RunArgs) {
  const state = await client.run({
    projectDir,
    ref: args.ref,
    namespace: args.namespace,
    parameters: args.parameters,
    dryRun: args.dry_run,
    clientTimeout: args.client_timeout,
  });
  return {
    success: state.jobStatus?.toLowerCase() === 'success',
    job_id: state.jobId,
    job_status: state.jobStatus,
  };
}

export const projectRunTool = defineLakehouseTool({
  description:
    'Run a Bauplan project directory on the server against a ref and return the job id. Non-dry runs on main are refused.',
  inputSchema: z
    .object({
      project_dir: z.string().min(1).describe('Path of the project directory containing bauplan_project.yml'),
      ...runShape,
    })
    .strict(),
  targets: runTargets,
  async execute(args, client) {
    return runProject(client, args.project_dir, args);
  },
});

/** Rejects file names that would escape the scratch project directory. */
export function validateProjectFiles(files: Record<string, string>): void {
  if (!Object.hasOwn(files, PROJECT_MANIFEST)) {
    throw new ToolArgumentError(`project_files must contain '${PROJECT_MANIFEST}'`);
  }
  for (const name of Object.keys(files)) {
    if (isAbsolute(name) || normalize(name).split(sep).includes('..') || name.split('/').includes('..')) {
      throw new ToolArgumentError(`Invalid file name '${name}': paths must be relative and stay inside the project`);
    }
    if (name !== PROJECT_MANIFEST && !name.endsWith('.sql') && !name.endsWith('.py')) {
      throw new ToolArgumentError(
        `Invalid file extension for '${name}'. Only .sql and .py files are allowed (besides ${PROJECT_MANIFEST})`
      );
    }
  }
}

export const codeRunTool = defineLakehouseTool({
  description:
    'Run a Bauplan project given as a map of file name to content and return the job id. Must include bauplan_project.yml; other files must be .sql or .py. Non-dry runs on main are refused.',
  inputSchema: z
    .object({
      project_files: z.record(z.string(), z.string()).describe('File name to file content'),
      ...runShape,
    })
    .strict(),
  validate(args) {
    validateProjectFiles(args.project_files);
  },
  targets: runTargets,
  async execute(args, client) {
    const projectDir = await mkdtemp(join(tmpdir(), 'bauplan-code-run-'));
    try {
      for (const [name, content] of Object.entries(args.project_files)) {
        const path = join(projectDir, name);
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, content, 'utf-8');
      }
      return await runProject(client, projectDir, args);
    } finally {
      await rm(projectDir, { recursive: true, force: true });
    }
  },
});
