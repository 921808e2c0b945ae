import type { ClientConfig } from '../auth/credential-resolver.js';

export interface UserInfo {
  username: string;
  fullName: string | null;
}

export interface TableSummary {
  name: string;
  namespace: string;
  kind?: string;
}

export interface SchemaField {
  name: string;
  type: string;
  required?: boolean;
  [key: string]: unknown;
}

export interface TableDetail {
  name: string;
  namespace: string;
  fields: SchemaField[];
  records?: number;
}

export interface BranchInfo {
  name: string;
  hash: string;
}

export interface CommitInfo {
  hash: string;
  message: string;
  author: { username?: string; name?: string; email?: string };
  authoredDate: string;
  parentHashes: string[];
}

export interface NamespaceInfo {
  name: string;
}

export interface TagInfo {
  name: string;
  hash?: string;
}

export interface JobSubmission {
  jobId: string;
}

export type JobStatus = 'COMPLETE' | 'FAIL' | 'ABORT' | 'RUNNING';

export interface JobInfo {
  id: string;
  kind: string;
  user: string;
  humanReadableStatus: string;
  status: string;
  createdAt: string | null;
  finishedAt: string | null;
}

export interface JobLogEntry {
  message: string;
  stream: string;
}

export interface QueryColumn {
  name: string;
  type: string;
}

export interface QueryResult {
  columns: QueryColumn[];
  rows: Record<string, unknown>[];
}

export interface RunState {
  jobId: string | null;
  jobStatus: string | null;
}

export type RunParameterValue = string | number | boolean;

export interface CreateTableParams {
  table: string;
  searchUri: string;
  branch: string;
  namespace?: string;
  partitionedBy?: string;
  replace?: boolean;
}

export interface ImportDataParams {
  table: string;
  searchUri: string;
  branch: string;
  namespace?: string;
  continueOnError?: boolean;
  clientTimeout: number;
}

export interface RevertTableParams {
  table: string;
  sourceRef: string;
  intoBranch: string;
  replace?: boolean;
}

export interface MergeBranchParams {
  sourceRef: string;
  intoBranch: string;
  commitMessage?: string;
  commitBody?: string;
}

export interface CommitFilter {
  ref: string;
  messageFilter?: string;
  authorUsername?: string;
  authorEmail?: string;
  dateStart?: string;
  dateEnd?: string;
  limit: number;
}

export interface QueryParams {
  query: string;
  ref?: string;
  namespace?: string;
}

export interface RunParams {
  projectDir: string;
  ref: string;
  namespace?: string;
  parameters?: Record<string, RunParameterValue>;
  dryRun: boolean;
  clientTimeout: number;
}

export interface JobFilter {
  jobId?: string;
  status?: JobStatus;
  finishedAfter?: Date;
  finishedBefore?: Date;
}

/**
 * The lakehouse as seen by tools. One instance serves exactly one tool call
 * and carries the credential it was built with.
 */
export interface LakehouseClient {
  info(): Promise<UserInfo>;

  getTables(ref: string, namespace?: string): Promise<TableSummary[]>;
  getTable(table: string, ref: string): Promise<TableDetail>;
  hasTable(table: string, ref: string): Promise<boolean>;
  createTable(params: CreateTableParams): Promise<TableSummary>;
  planTableCreation(params: CreateTableParams): Promise<JobSubmission>;
  applyTableCreationPlan(plan: Record<string, unknown>, clientTimeout: number): Promise<JobSubmission>;
  importData(params: ImportDataParams): Promise<JobSubmission>;
  deleteTable(table: string, branch: string): Promise<void>;
  revertTable(params: RevertTableParams): Promise<void>;

  getBranches(filter: { name?: string; user?: string; limit: number }): Promise<BranchInfo[]>;
  hasBranch(branch: string): Promise<boolean>;
  createBranch(branch: string, fromRef: string): Promise<BranchInfo>;
  deleteBranch(branch: string): Promise<void>;
  mergeBranch(params: MergeBranchParams): Promise<void>;
  getCommits(filter: CommitFilter): Promise<CommitInfo[]>;

  getNamespaces(filter: { ref: string; name?: string; limit: number }): Promise<NamespaceInfo[]>;
  hasNamespace(namespace: string, ref: string): Promise<boolean>;
  createNamespace(namespace: string, branch: string): Promise<void>;
  deleteNamespace(namespace: string, branch: string): Promise<void>;

  getTags(filter: { name?: string; limit: number }): Promise<TagInfo[]>;
  hasTag(tag: string): Promise<boolean>;
  createTag(tag: string, fromRef: string): Promise<TagInfo>;
  deleteTag(tag: string): Promise<void>;

  query(params: QueryParams): Promise<QueryResult>;
  queryToCsvFile(params: QueryParams & { path: string; clientTimeout: number }): Promise<void>;
  run(params: RunParams): Promise<RunState>;

  listJobs(filter: JobFilter): Promise<JobInfo[]>;
  getJob(jobId: string): Promise<JobInfo>;
  getJobLogs(jobIdPrefix: string): Promise<JobLogEntry[]>;
  cancelJob(jobId: string): Promise<JobInfo>;
}

/** Builds a fresh client for one tool call. */
export type LakehouseClientFactory = (config: ClientConfig) => LakehouseClient;
