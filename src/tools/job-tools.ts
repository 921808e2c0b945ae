import { z } from 'zod';
import type { JobInfo, JobStatus } from '../clients/lakehouse-client.js';
import { ToolArgumentError } from '../errors.js';
import { defineLakehouseTool } from './types.js';

export const JOB_STATUSES: readonly JobStatus[] = ['COMPLETE', 'FAIL', 'ABORT', 'RUNNING'];

/** Only jobs that ran a code snapshot (pipeline runs) are listed. */
const PIPELINE_RUN_KIND = 'CodeSnapshotRun';

const TIMESTAMP_PATTERN = /^(\d{2})\/(\d{2})\/(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Parses `MM/DD/YY HH:MM:SS` as UTC. Two-digit years 69-99 fall in the
 * 1900s, the rest in the 2000s.
 */
export function parseJobTimestamp(value: string): Date {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    throw new ToolArgumentError(`Invalid time '${value}': expected MM/DD/YY HH:MM:SS, e.g. 09/19/22 13:55:26`);
  }
  const [month, day, shortYear, hours, minutes, seconds] = match.slice(1).map(Number);
  const year = shortYear >= 69 ? 1900 + shortYear : 2000 + shortYear;
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  if (
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hours ||
    date.getUTCMinutes() !== minutes ||
    date.getUTCSeconds() !== seconds
  ) {
    throw new ToolArgumentError(`Invalid time '${value}': not a real calendar time`);
  }
  return date;
}

export function parseJobStatus(value: string): JobStatus {
  const status = JOB_STATUSES.find((candidate) => candidate === value.trim().toUpperCase());
  if (!status) {
    throw new ToolArgumentError(`Invalid job status: ${value}: should be one of ${JOB_STATUSES.join(', ')}`);
  }
  return status;
}

function formatJob(job: JobInfo) {
  return {
    id: job.id,
    kind: job.kind,
    user: job.user,
    human_readable_status: job.humanReadableStatus,
    created_at: job.createdAt,
    finished_at: job.finishedAt,
    status: job.status,
  };
}

const listJobsSchema = z
  .object({
    job_id: z.string().optional().describe('Only the job with this id'),
    status: z.string().optional().describe(`Only jobs in this status: ${JOB_STATUSES.join(', ')}`),
    user_name: z.string().optional().describe('Only jobs started by this user'),
    start_time: z.string().optional().describe('Only jobs finished after this UTC time, MM/DD/YY HH:MM:SS'),
    end_time: z.string().optional().describe('Only jobs finished before this UTC time, MM/DD/YY HH:MM:SS'),
  })
  .strict();

function toJobFilter(args: z.output<typeof listJobsSchema>) {
  return {
    jobId: args.job_id,
    status: args.status === undefined ? undefined : parseJobStatus(args.status),
    finishedAfter: args.start_time === undefined ? undefined : parseJobTimestamp(args.start_time),
    finishedBefore: args.end_time === undefined ? undefined : parseJobTimestamp(args.end_time),
  };
}

export const listJobsTool = defineLakehouseTool({
  description:
    'List pipeline-run jobs, optionally filtered by job id, status (COMPLETE, FAIL, ABORT, RUNNING), user name, and finish time window (UTC, MM/DD/YY HH:MM:SS).',
  inputSchema: listJobsSchema,
  validate(args) {
    toJobFilter(args);
  },
  async execute(args, client) {
    const jobs = (await client.listJobs(toJobFilter(args)))
      .filter((job) => job.kind === PIPELINE_RUN_KIND)
      .filter((job) => args.user_name === undefined || job.user === args.user_name);
    return { jobs: jobs.map(formatJob), total_count: jobs.length };
  },
});

export const getJobTool = defineLakehouseTool({
  description: 'Get the details of one job.',
  inputSchema: z
    .object({
      job_id: z.string().min(1).describe('Job id'),
    })
    .strict(),
  async execute(args, client) {
    return formatJob(await client.getJob(args.job_id));
  },
});

export const getJobLogsTool = defineLakehouseTool({
  description: 'Get the logs of a job by job id prefix.',
  inputSchema: z
    .object({
      job_id_prefix: z.string().min(1).describe('Job id or a unique prefix of it'),
    })
    .strict(),
  async execute(args, client) {
    const logs = await client.getJobLogs(args.job_id_prefix);
    return { logs, total_count: logs.length };
  },
});

export const cancelJobTool = defineLakehouseTool({
  description: 'Cancel a running job and return its updated details.',
  inputSchema: z
    .object({
      job_id: z.string().min(1).describe('Job id'),
    })
    .strict(),
  async execute(args, client) {
    return formatJob(await client.cancelJob(args.job_id));
  },
});
