import { z } from 'zod';
import { DEFAULT_CLIENT_TIMEOUT_SECONDS, DEFAULT_NAMESPACE } from '../constants.js';
import { assertReadOnlyQuery } from '../validators/query-validator.js';
import { defineLakehouseTool } from './types.js';

const queryShape = {
  query: z.string().describe('SQL SELECT query in the DuckDB dialect'),
  ref: z
    .string()
    .optional()
    .describe('Branch name or commit reference to query (defaults to the lakehouse default branch)'),
  namespace: z.string().optional().describe(`Namespace to resolve unqualified tables in (defaults to "${DEFAULT_NAMESPACE}")`),
};

export const runQueryTool = defineLakehouseTool({
  description: 'Run a read-only SQL SELECT query against a ref and return the rows.',
  inputSchema: z.object(queryShape).strict(),
  validate(args) {
    assertReadOnlyQuery(args.query);
  },
  async execute(args, client) {
    const result = await client.query({
      query: args.query,
      ref: args.ref,
      namespace: args.namespace ?? DEFAULT_NAMESPACE,
    });
    return {
      status: 'success',
      data: result.rows,
      metadata: {
        row_count: result.rows.length,
        column_names: result.columns.map((column) => column.name),
        column_types: result.columns.map((column) => column.type),
        query_time: new Date().toISOString(),
        query: args.query,
      },
      error: null,
    };
  },
});

export const runQueryToCsvTool = defineLakehouseTool({
  description:
    'Run a read-only SQL SELECT query and write the result to a CSV file on the server. Columns holding lists or structs cannot be exported.',
  inputSchema: z
    .object({
      path: z.string().min(1).describe('Destination path of the CSV file'),
      ...queryShape,
      client_timeout: z.number().int().positive().default(DEFAULT_CLIENT_TIMEOUT_SECONDS).describe('Timeout in seconds'),
    })
    .strict(),
  validate(args) {
    assertReadOnlyQuery(args.query);
  },
  async execute(args, client) {
    await client.queryToCsvFile({
      path: args.path,
      query: args.query,
      ref: args.ref,
      namespace: args.namespace ?? DEFAULT_NAMESPACE,
      clientTimeout: args.client_timeout,
    });
    return {
      path: args.path,
      query: args.query,
      ref: args.ref ?? null,
      namespace: args.namespace ?? null,
      success: true,
      message: `Query results written to ${args.path}`,
    };
  },
});
