import { execa, ExecaError } from 'execa';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import type { ClientConfig } from '../auth/credential-resolver.js';
import { DEFAULT_NAMESPACE } from '../constants.js';
import { LakehouseCommandError } from '../errors.js';
import type {
  BranchInfo,
  CommitFilter,
  CommitInfo,
  CreateTableParams,
  ImportDataParams,
  JobFilter,
  JobInfo,
  JobLogEntry,
  JobSubmission,
  LakehouseClient,
  LakehouseClientFactory,
  MergeBranchParams,
  NamespaceInfo,
  QueryParams,
  QueryResult,
  RevertTableParams,
  RunParams,
  RunState,
  TableDetail,
  TableSummary,
  TagInfo,
  UserInfo,
} from './lakehouse-client.js';

/** Child environment; `undefined` removes an inherited variable. */
export type CommandEnv = Record<string, string | undefined>;

/** Runs one CLI invocation and returns its stdout; throws LakehouseCommandError on failure. */
export type CommandRunner = (
  file: string,
  args: string[],
  options: { env: CommandEnv; timeoutMs: number }
) => Promise<string>;

export interface CliClientOptions {
  cliPath: string;
  commandTimeoutMs: number;
  runner?: CommandRunner;
}

/** Lists are fetched with this ceiling when only existence matters. */
const EXISTENCE_SCAN_LIMIT = 1000;

export const execaRunner: CommandRunner = async (file, args, options) => {
  const command = `${file} ${args[0] ?? ''}`.trim();
  try {
    const result = await execa(file, args, {
      env: options.env,
      timeout: options.timeoutMs,
      stripFinalNewline: true,
    });
    return result.stdout;
  } catch (error) {
    if (error instanceof ExecaError) {
      const stderr = typeof error.stderr === 'string' ? error.stderr.trim() : '';
      const message = error.timedOut
        ? `${command} timed out after ${options.timeoutMs}ms`
        : stderr || error.shortMessage;
      throw new LakehouseCommandError(message, command, error.exitCode);
    }
    throw error;
  }
};

const userInfoSchema = z.object({
  user: z.object({
    username: z.string(),
    full_name: z.string().nullish(),
  }),
});

const tableSummarySchema = z.object({
  name: z.string(),
  namespace: z.string(),
  kind: z.string().optional(),
});

const tableDetailSchema = z.object({
  name: z.string(),
  namespace: z.string(),
  records: z.number().optional(),
  fields: z.array(
    z.looseObject({
      name: z.string(),
      type: z.string(),
      required: z.boolean().optional(),
    })
  ),
});

const refSchema = z.object({ name: z.string(), hash: z.string() });

const commitSchema = z
  .object({
    ref: z.string().optional(),
    hash: z.string().optional(),
    message: z.string().nullish(),
    author: z
      .object({
        username: z.string().nullish(),
        name: z.string().nullish(),
        email: z.string().nullish(),
      })
      .nullish(),
    authored_date: z.string().nullish(),
    parent_hashes: z.array(z.string()).nullish(),
  })
  .transform((commit, ctx) => {
    const hash = commit.hash ?? commit.ref;
    if (hash === undefined) {
      ctx.issues.push({ code: 'custom', message: 'commit carries neither hash nor ref', input: commit });
      return z.NEVER;
    }
    return { ...commit, hash };
  });

const namespaceSchema = z.object({ name: z.string() });

const tagSchema = z.object({ name: z.string(), hash: z.string().optional() });

const jobSubmissionSchema = z.object({ job_id: z.string() });

const jobSchema = z.object({
  id: z.string(),
  kind: z.string(),
  user: z.string(),
  human_readable_status: z.string(),
  status: z.string(),
  created_at: z.string().nullish(),
  finished_at: z.string().nullish(),
});

const jobLogSchema = z.object({ message: z.string(), stream: z.string() });

const queryResultSchema = z.object({
  columns: z.array(z.object({ name: z.string(), type: z.string() })),
  rows: z.array(z.record(z.string(), z.unknown())),
});

const runStateSchema = z.object({
  job_id: z.string().nullish(),
  job_status: z.string().nullish(),
});

function toJob(job: z.infer<typeof jobSchema>): JobInfo {
  return {
    id: job.id,
    kind: job.kind,
    user: job.user,
    humanReadableStatus: job.human_readable_status,
    status: job.status,
    createdAt: job.created_at ?? null,
    finishedAt: job.finished_at ?? null,
  };
}

function optionalFlag(flag: string, value: string | number | undefined): string[] {
  return value === undefined ? [] : [flag, String(value)];
}

function booleanFlag(flag: string, value: boolean | undefined): string[] {
  return value ? [flag] : [];
}

/** The query text goes after `--`, so a leading SQL comment is not read as an option. */
function queryArgs(params: QueryParams): string[] {
  return [
    'query',
    ...optionalFlag('--ref', params.ref),
    ...optionalFlag('--namespace', params.namespace),
    '--',
    params.query,
  ];
}

function splitTableName(table: string): { namespace?: string; name: string } {
  const dot = table.indexOf('.');
  return dot === -1 ? { name: table } : { namespace: table.slice(0, dot), name: table.slice(dot + 1) };
}

function csvCell(column: string, value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'object') {
    throw new Error(
      `Cannot export to CSV: column '${column}' holds ${Array.isArray(value) ? 'list' : 'nested'} values. ` +
        'Use run_query for complex data, flatten arrays with unnest(), or convert them with array_to_string().'
    );
  }
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(result: QueryResult): string {
  const names = result.columns.map((column) => column.name);
  const lines = [names.map((name) => csvCell(name, name)).join(',')];
  for (const row of result.rows) {
    lines.push(names.map((name) => csvCell(name, row[name])).join(','));
  }
  return lines.join('\n') + '\n';
}

/**
 * LakehouseClient over the `bauplan` CLI. Each operation spawns one process
 * with JSON output; the credential travels as a global flag (profile) or in
 * the child environment (API key), never both.
 */
export class CliLakehouseClient implements LakehouseClient {
  private readonly runner: CommandRunner;

  constructor(
    private readonly config: ClientConfig,
    private readonly options: CliClientOptions
  ) {
    this.runner = options.runner ?? execaRunner;
  }

  private globalArgs(): string[] {
    const args = ['--output', 'json'];
    if (this.config.source === 'profile') {
      args.unshift('--profile', this.config.profile);
    }
    return args;
  }

  private env(): CommandEnv {
    return {
      BAUPLAN_API_KEY: this.config.source === 'api_key' ? this.config.apiKey : undefined,
    };
  }

  private async exec(args: string[], clientTimeoutSeconds?: number): Promise<string> {
    const timeoutMs =
      clientTimeoutSeconds === undefined
        ? this.options.commandTimeoutMs
        : Math.max(this.options.commandTimeoutMs, clientTimeoutSeconds * 1000);
    return this.runner(this.options.cliPath, [...this.globalArgs(), ...args], {
      env: this.env(),
      timeoutMs,
    });
  }

  private async json<T>(schema: z.ZodType<T>, args: string[], clientTimeoutSeconds?: number): Promise<T> {
    const stdout = await this.exec(args, clientTimeoutSeconds);
    const command = [this.options.cliPath, ...args.slice(0, 2).filter((arg) => !arg.startsWith('-'))].join(' ');
    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch {
      throw new LakehouseCommandError(`Unexpected non-JSON output from ${command}: ${stdout.slice(0, 200)}`, command, 0);
    }
    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new LakehouseCommandError(`Unexpected output shape from ${command}: ${result.error.message}`, command, 0);
    }
    return result.data;
  }

  async info(): Promise<UserInfo> {
    const info = await this.json(userInfoSchema, ['info']);
    return { username: info.user.username, fullName: info.user.full_name ?? null };
  }

  async getTables(ref: string, namespace?: string): Promise<TableSummary[]> {
    return this.json(z.array(tableSummarySchema), ['table', 'ls', '--ref', ref, ...optionalFlag('--namespace', namespace)]);
  }

  async getTable(table: string, ref: string): Promise<TableDetail> {
    return this.json(tableDetailSchema, ['table', 'get', '--ref', ref, '--', table]);
  }

  async hasTable(table: string, ref: string): Promise<boolean> {
    const { namespace = DEFAULT_NAMESPACE, name } = splitTableName(table);
    const tables = await this.getTables(ref, namespace);
    return tables.some((t) => t.namespace === namespace && t.name === name);
  }

  async createTable(params: CreateTableParams): Promise<TableSummary> {
    return this.json(tableSummarySchema, [
      'table',
      'create',
      '--name',
      params.table,
      '--search-uri',
      params.searchUri,
      '--branch',
      params.branch,
      ...optionalFlag('--namespace', params.namespace),
      ...optionalFlag('--partitioned-by', params.partitionedBy),
      ...booleanFlag('--replace', params.replace),
    ]);
  }

  async planTableCreation(params: CreateTableParams): Promise<JobSubmission> {
    const submission = await this.json(jobSubmissionSchema, [
      'table',
      'create-plan',
      '--name',
      params.table,
      '--search-uri',
      params.searchUri,
      '--branch',
      params.branch,
      ...optionalFlag('--namespace', params.namespace),
      ...optionalFlag('--partitioned-by', params.partitionedBy),
      ...booleanFlag('--replace', params.replace),
    ]);
    return { jobId: submission.job_id };
  }

  async applyTableCreationPlan(plan: Record<string, unknown>, clientTimeout: number): Promise<JobSubmission> {
    const dir = await mkdtemp(join(tmpdir(), 'bauplan-plan-'));
    try {
      // JSON is valid YAML, which is what the CLI reads plans as.
      const planPath = join(dir, 'plan.yml');
      await writeFile(planPath, JSON.stringify(plan, null, 2), 'utf-8');
      const submission = await this.json(
        jobSubmissionSchema,
        ['table', 'create-plan-apply', '--plan', planPath, '--client-timeout', String(clientTimeout)],
        clientTimeout
      );
      return { jobId: submission.job_id };
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  async importData(params: ImportDataParams): Promise<JobSubmission> {
    const submission = await this.json(
      jobSubmissionSchema,
      [
        'table',
        'import',
        '--name',
        params.table,
        '--search-uri',
        params.searchUri,
        '--branch',
        params.branch,
        ...optionalFlag('--namespace', params.namespace),
        ...booleanFlag('--continue-on-error', params.continueOnError),
        '--client-timeout',
        String(params.clientTimeout),
      ],
      params.clientTimeout
    );
    return { jobId: submission.job_id };
  }

  async deleteTable(table: string, branch: string): Promise<void> {
    await this.exec(['table', 'rm', '--branch', branch, '--', table]);
  }

  async revertTable(params: RevertTableParams): Promise<void> {
    await this.exec([
      'table',
      'revert',
      '--source-ref',
      params.sourceRef,
      '--into-branch',
      params.intoBranch,
      ...booleanFlag('--replace', params.replace),
      '--',
      params.table,
    ]);
  }

  async getBranches(filter: { name?: string; user?: string; limit: number }): Promise<BranchInfo[]> {
    const branches = await this.json(z.array(refSchema), [
      'branch',
      'ls',
      ...optionalFlag('--name', filter.name),
      ...optionalFlag('--user', filter.user),
      '--limit',
      String(filter.limit),
    ]);
    return branches.slice(0, filter.limit);
  }

  async hasBranch(branch: string): Promise<boolean> {
    const branches = await this.getBranches({ name: branch, limit: EXISTENCE_SCAN_LIMIT });
    return branches.some((b) => b.name === branch);
  }

  async createBranch(branch: string, fromRef: string): Promise<BranchInfo> {
    return this.json(refSchema, ['branch', 'create', '--from-ref', fromRef, '--', branch]);
  }

  async deleteBranch(branch: string): Promise<void> {
    await this.exec(['branch', 'rm', '--', branch]);
  }

  async mergeBranch(params: MergeBranchParams): Promise<void> {
    await this.exec([
      'branch',
      'merge',
      '--into-branch',
      params.intoBranch,
      ...optionalFlag('--commit-message', params.commitMessage),
      ...optionalFlag('--commit-body', params.commitBody),
      '--',
      params.sourceRef,
    ]);
  }

  async getCommits(filter: CommitFilter): Promise<CommitInfo[]> {
    const commits = await this.json(z.array(commitSchema), [
      'commit',
      '--ref',
      filter.ref,
      ...optionalFlag('--message', filter.messageFilter),
      ...optionalFlag('--author-username', filter.authorUsername),
      ...optionalFlag('--author-email', filter.authorEmail),
      ...optionalFlag('--since', filter.dateStart),
      ...optionalFlag('--until', filter.dateEnd),
      '--max-count',
      String(filter.limit),
    ]);
    return commits.slice(0, filter.limit).map((commit) => ({
      hash: commit.hash,
      message: commit.message ?? '',
      author: {
        username: commit.author?.username ?? undefined,
        name: commit.author?.name ?? undefined,
        email: commit.author?.email ?? undefined,
      },
      authoredDate: commit.authored_date ?? '',
      parentHashes: commit.parent_hashes ?? [],
    }));
  }

  async getNamespaces(filter: { ref: string; name?: string; limit: number }): Promise<NamespaceInfo[]> {
    const namespaces = await this.json(z.array(namespaceSchema), [
      'namespace',
      'ls',
      '--ref',
      filter.ref,
      ...optionalFlag('--name', filter.name),
      '--limit',
      String(filter.limit),
    ]);
    return namespaces.slice(0, filter.limit);
  }

  async hasNamespace(namespace: string, ref: string): Promise<boolean> {
    const namespaces = await this.getNamespaces({ ref, name: namespace, limit: EXISTENCE_SCAN_LIMIT });
    return namespaces.some((ns) => ns.name === namespace);
  }

  async createNamespace(namespace: string, branch: string): Promise<void> {
    await this.exec(['namespace', 'create', '--branch', branch, '--', namespace]);
  }

  async deleteNamespace(namespace: string, branch: string): Promise<void> {
    await this.exec(['namespace', 'rm', '--branch', branch, '--', namespace]);
  }

  async getTags(filter: { name?: string; limit: number }): Promise<TagInfo[]> {
    const tags = await this.json(z.array(tagSchema), [
      'tag',
      'ls',
      ...optionalFlag('--name', filter.name),
      '--limit',
      String(filter.limit),
    ]);
    return tags.slice(0, filter.limit);
  }

  async hasTag(tag: string): Promise<boolean> {
    const tags = await this.getTags({ name: tag, limit: EXISTENCE_SCAN_LIMIT });
    return tags.some((t) => t.name === tag);
  }

  async createTag(tag: string, fromRef: string): Promise<TagInfo> {
    return this.json(tagSchema, ['tag', 'create', '--from-ref', fromRef, '--', tag]);
  }

  async deleteTag(tag: string): Promise<void> {
    await this.exec(['tag', 'rm', '--', tag]);
  }

  async query(params: QueryParams): Promise<QueryResult> {
    return this.json(queryResultSchema, queryArgs(params));
  }

  async queryToCsvFile(params: QueryParams & { path: string; clientTimeout: number }): Promise<void> {
    const result = await this.json(queryResultSchema, queryArgs(params), params.clientTimeout);
    await writeFile(params.path, toCsv(result), 'utf-8');
  }

  async run(params: RunParams): Promise<RunState> {
    const parameterArgs = Object.entries(params.parameters ?? {}).flatMap(([key, value]) => [
      '--param',
      `${key}=${String(value)}`,
    ]);
    const state = await this.json(
      runStateSchema,
      [
        'run',
        '--project-dir',
        params.projectDir,
        '--ref',
        params.ref,
        ...optionalFlag('--namespace', params.namespace),
        ...booleanFlag('--dry-run', params.dryRun),
        ...parameterArgs,
        '--client-timeout',
        String(params.clientTimeout),
      ],
      params.clientTimeout
    );
    return { jobId: state.job_id ?? null, jobStatus: state.job_status ?? null };
  }

  async listJobs(filter: JobFilter): Promise<JobInfo[]> {
    const jobs = await this.json(z.array(jobSchema), [
      'job',
      'ls',
      ...optionalFlag('--id', filter.jobId),
      ...optionalFlag('--status', filter.status),
      ...optionalFlag('--finished-after', filter.finishedAfter?.toISOString()),
      ...optionalFlag('--finished-before', filter.finishedBefore?.toISOString()),
    ]);
    return jobs.map(toJob);
  }

  async getJob(jobId: string): Promise<JobInfo> {
    return toJob(await this.json(jobSchema, ['job', 'get', '--', jobId]));
  }

  async getJobLogs(jobIdPrefix: string): Promise<JobLogEntry[]> {
    return this.json(z.array(jobLogSchema), ['job', 'logs', '--', jobIdPrefix]);
  }

  async cancelJob(jobId: string): Promise<JobInfo> {
    return toJob(await this.json(jobSchema, ['job', 'stop', '--', jobId]));
  }
}

export function createCliClientFactory(options: CliClientOptions): LakehouseClientFactory {
  return (config) => new CliLakehouseClient(config, options);
}
