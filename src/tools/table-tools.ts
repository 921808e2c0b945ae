import { z } from 'zod';
import { DEFAULT_CLIENT_TIMEOUT_SECONDS, DEFAULT_NAMESPACE } from '../constants.js';
import type { TableDetail } from '../clients/lakehouse-client.js';
import { ToolArgumentError } from '../errors.js';
import { defineLakehouseTool } from './types.js';

const refDescription =
  'A commit reference ("@" followed by a 64-character hash) or a branch name, resolved to its latest commit';

/** Table names without a namespace live in the default one. */
export function qualifyTableName(table: string, namespace?: string): string {
  return table.includes('.') ? table : `${namespace ?? DEFAULT_NAMESPACE}.${table}`;
}

export const listTablesTool = defineLakehouseTool({
  description: 'List the tables in a ref, optionally restricted to one namespace.',
  inputSchema: z
    .object({
      ref: z.string().min(1).describe(refDescription),
      namespace: z.string().optional().describe('Only list tables in this namespace'),
    })
    .strict(),
  async execute(args, client) {
    const tables = await client.getTables(args.ref, args.namespace);
    return { tables: tables.map((t) => t.name), total_count: tables.length };
  },
});

export const getTableTool = defineLakehouseTool({
  description: 'Get the schema and metadata of one table at a ref.',
  inputSchema: z
    .object({
      ref: z.string().min(1).describe(refDescription),
      table_name: z.string().min(1).describe('Table name, with or without its namespace prefix'),
      namespace: z.string().optional().describe(`Namespace of the table (defaults to "${DEFAULT_NAMESPACE}")`),
    })
    .strict(),
  async execute(args, client) {
    const table = await client.getTable(qualifyTableName(args.table_name, args.namespace), args.ref);
    return {
      name: table.name,
      namespace: table.namespace,
      records: table.records,
      fields: table.fields,
    };
  },
});

export const getSchemaTool = defineLakehouseTool({
  description: 'Get the schema of every table in a namespace at a ref.',
  inputSchema: z
    .object({
      ref: z.string().min(1).describe(refDescription),
      namespace: z.string().optional().describe(`Namespace to read (defaults to "${DEFAULT_NAMESPACE}")`),
    })
    .strict(),
  async execute(args, client) {
    const namespace = args.namespace ?? DEFAULT_NAMESPACE;
    const tables = await client.getTables(args.ref, namespace);
    const schemas: Omit<TableDetail, 'records'>[] = [];
    for (const table of tables) {
      const detail = await client.getTable(`${namespace}.${table.name}`, args.ref);
      schemas.push({ name: detail.name, namespace: detail.namespace, fields: detail.fields });
    }
    return { tables: schemas, total_count: schemas.length };
  },
});

export const hasTableTool = defineLakehouseTool({
  description: 'Check whether a table exists at a ref.',
  inputSchema: z
    .object({
      table: z.string().min(1).describe('Table name, optionally prefixed with its namespace'),
      ref: z.string().min(1).describe(refDescription),
    })
    .strict(),
  async execute(args, client) {
    const exists = await client.hasTable(qualifyTableName(args.table), args.ref);
    return {
      table_name: args.table,
      exists,
      message: `Table '${args.table}' ${exists ? 'exists' : 'does not exist'} in ref '${args.ref}'`,
    };
  },
});

const creationShape = {
  table: z.string().min(1).describe('Name of the table to create'),
  search_uri: z.string().min(1).describe('S3 URI pattern of the source files, e.g. s3://bucket/path/*.parquet'),
  namespace: z.string().optional().describe(`Namespace for the table (defaults to "${DEFAULT_NAMESPACE}")`),
  partitioned_by: z.string().optional().describe('Partitioning column or expression'),
  replace: z.boolean().optional().describe('Replace the table if it already exists'),
};

export const createTableTool = defineLakehouseTool({
  description:
    'Create a table from S3 files whose schemas agree. Use plan_table_creation instead when the files conflict. Never targets main.',
  inputSchema: z
    .object({
      ...creationShape,
      branch: z.string().min(1).describe('Branch to create the table in'),
    })
    .strict(),
  targets: (args) => [{ argument: 'branch', ref: args.branch }],
  async execute(args, client) {
    const table = await client.createTable({
      table: args.table,
      searchUri: args.search_uri,
      branch: args.branch,
      namespace: args.namespace,
      partitionedBy: args.partitioned_by,
      replace: args.replace,
    });
    return {
      table_name: table.name,
      namespace: table.namespace,
      success: true,
      message: `Table '${table.namespace}.${table.name}' created on branch '${args.branch}'`,
    };
  },
});

export const planTableCreationTool = defineLakehouseTool({
  description:
    'Plan the creation of a table from S3 files and return a job id. The plan can be edited to resolve schema conflicts before apply_table_creation_plan.',
  inputSchema: z
    .object({
      ...creationShape,
      branch: z.string().min(1).describe('Branch the table will be created in'),
    })
    .strict(),
  targets: (args) => [{ argument: 'branch', ref: args.branch }],
  async execute(args, client) {
    const submission = await client.planTableCreation({
      table: args.table,
      searchUri: args.search_uri,
      branch: args.branch,
      namespace: args.namespace,
      partitionedBy: args.partitioned_by,
      replace: args.replace,
    });
    return {
      job_id: submission.jobId,
      table_name: args.table,
      search_uri: args.search_uri,
      namespace: args.namespace ?? null,
      branch: args.branch,
      success: true,
      message: `Table creation plan submitted as job ${submission.jobId}`,
    };
  },
});

/** The branch a plan writes to; a plan without one would land on the CLI's active branch. */
export function planBranch(plan: Record<string, unknown>): string {
  const branch = plan.branch;
  if (typeof branch !== 'string' || branch.trim() === '') {
    throw new ToolArgumentError("plan must name the target branch in a top-level 'branch' field");
  }
  return branch;
}

export const applyTableCreationPlanTool = defineLakehouseTool({
  description: 'Apply an edited table creation plan to resolve schema conflicts. Returns a job id to track.',
  inputSchema: z
    .object({
      plan: z.record(z.string(), z.unknown()).describe('The table creation plan to apply'),
      client_timeout: z.number().int().positive().default(DEFAULT_CLIENT_TIMEOUT_SECONDS).describe('Timeout in seconds'),
    })
    .strict(),
  validate: (args) => {
    planBranch(args.plan);
  },
  targets: (args) => [{ argument: 'branch', ref: planBranch(args.plan) }],
  async execute(args, client) {
    const submission = await client.applyTableCreationPlan(args.plan, args.client_timeout);
    return {
      job_id: submission.jobId,
      success: true,
      message: `Table creation plan applied as job ${submission.jobId}`,
    };
  },
});

export const importDataTool = defineLakehouseTool({
  description: 'Import data from S3 into an existing table. Returns a job id to track.',
  inputSchema: z
    .object({
      table: z.string().min(1).describe('Table to import into'),
      search_uri: z.string().min(1).describe('S3 URI pattern of the files to import'),
      namespace: z.string().optional().describe(`Namespace of the table (defaults to "${DEFAULT_NAMESPACE}")`),
      branch: z.string().min(1).describe('Branch to import into'),
      continue_on_error: z.boolean().default(false).describe('Keep importing when a file fails'),
      client_timeout: z.number().int().positive().default(DEFAULT_CLIENT_TIMEOUT_SECONDS).describe('Timeout in seconds'),
    })
    .strict(),
  targets: (args) => [{ argument: 'branch', ref: args.branch }],
  async execute(args, client) {
    const submission = await client.importData({
      table: args.table,
      searchUri: args.search_uri,
      namespace: args.namespace,
      branch: args.branch,
      continueOnError: args.continue_on_error,
      clientTimeout: args.client_timeout,
    });
    return {
      table_name: args.table,
      job_id: submission.jobId,
      success: true,
      message: `Import into '${args.table}' submitted as job ${submission.jobId}`,
    };
  },
});

export const deleteTableTool = defineLakehouseTool({
  description: 'Delete a table from a branch. Never targets main.',
  inputSchema: z
    .object({
      table: z.string().min(1).describe('Table to delete'),
      branch: z.string().min(1).describe('Branch to delete the table from'),
    })
    .strict(),
  targets: (args) => [{ argument: 'branch', ref: args.branch }],
  async execute(args, client) {
    await client.deleteTable(args.table, args.branch);
    return {
      table_name: args.table,
      deleted: true,
      message: `Table '${args.table}' deleted from branch '${args.branch}'`,
    };
  },
});

export const revertTableTool = defineLakehouseTool({
  description: 'Revert a table in a branch to its state at a source ref. Never targets main.',
  inputSchema: z
    .object({
      table: z.string().min(1).describe('Table to revert'),
      source_ref: z.string().min(1).describe('Ref holding the state to revert to'),
      into_branch: z.string().min(1).describe('Branch receiving the reverted table'),
      replace: z.boolean().optional().describe('Replace the table if it exists in the target branch'),
    })
    .strict(),
  targets: (args) => [{ argument: 'into_branch', ref: args.into_branch }],
  async execute(args, client) {
    await client.revertTable({
      table: args.table,
      sourceRef: args.source_ref,
      intoBranch: args.into_branch,
      replace: args.replace,
    });
    return {
      table_name: args.table,
      source_ref: args.source_ref,
      into_branch: args.into_branch,
      success: true,
      message: `Table '${args.table}' reverted to '${args.source_ref}' in branch '${args.into_branch}'`,
    };
  },
});
