import { z } from 'zod';
import { DEFAULT_LIST_LIMIT } from '../constants.js';
import { defineLakehouseTool } from './types.js';

export const getNamespacesTool = defineLakehouseTool({
  description: 'List the namespaces of a ref, optionally filtered by name.',
  inputSchema: z
    .object({
      ref: z.string().min(1).describe('Branch name or commit reference'),
      namespace: z.string().optional().describe('Only namespaces whose name matches'),
      limit: z.number().int().positive().default(DEFAULT_LIST_LIMIT).describe('Maximum number of namespaces to return'),
    })
    .strict(),
  async execute(args, client) {
    const namespaces = await client.getNamespaces({ ref: args.ref, name: args.namespace, limit: args.limit });
    return { namespaces, total_count: namespaces.length };
  },
});

export const hasNamespaceTool = defineLakehouseTool({
  description: 'Check whether a namespace exists in a branch.',
  inputSchema: z
    .object({
      namespace: z.string().min(1).describe('Namespace to check'),
      branch: z.string().min(1).describe('Branch to look in'),
    })
    .strict(),
  async execute(args, client) {
    const exists = await client.hasNamespace(args.namespace, args.branch);
    return {
      namespace_name: args.namespace,
      branch_name: args.branch,
      exists,
      message: `Namespace '${args.namespace}' ${exists ? 'exists' : 'does not exist'} in branch '${args.branch}'`,
    };
  },
});

export const createNamespaceTool = defineLakehouseTool({
  description: 'Create a namespace in a branch. Never targets main.',
  inputSchema: z
    .object({
      namespace: z.string().min(1).describe('Namespace to create'),
      branch: z.string().min(1).describe('Branch to create it in'),
    })
    .strict(),
  targets: (args) => [{ argument: 'branch', ref: args.branch }],
  async execute(args, client) {
    await client.createNamespace(args.namespace, args.branch);
    return {
      created: true,
      namespace: args.namespace,
      branch: args.branch,
      message: `Namespace '${args.namespace}' created in branch '${args.branch}'`,
    };
  },
});

export const deleteNamespaceTool = defineLakehouseTool({
  description: 'Delete a namespace from a branch. Never targets main.',
  inputSchema: z
    .object({
      namespace: z.string().min(1).describe('Namespace to delete'),
      branch: z.string().min(1).describe('Branch to delete it from'),
    })
    .strict(),
  targets: (args) => [{ argument: 'branch', ref: args.branch }],
  async execute(args, client) {
    await client.deleteNamespace(args.namespace, args.branch);
    return {
      deleted: true,
      namespace: args.namespace,
      branch: args.branch,
      message: `Namespace '${args.namespace}' deleted from branch '${args.branch}'`,
    };
  },
});
