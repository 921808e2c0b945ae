import { z } from 'zod';
import { DEFAULT_LIST_LIMIT } from '../constants.js';
import { ToolArgumentError } from '../errors.js';
import { defineLakehouseTool } from './types.js';

const limitSchema = z.number().int().positive().default(DEFAULT_LIST_LIMIT);

export const getBranchesTool = defineLakehouseTool({
  description:
    'List branches, optionally filtered by name or owner. Responses can be large; always pass a limit.',
  inputSchema: z
    .object({
      name: z.string().optional().describe('Only branches whose name matches'),
      user: z.string().optional().describe('Only branches owned by this user'),
      limit: limitSchema.describe('Maximum number of branches to return'),
    })
    .strict(),
  async execute(args, client) {
    const branches = await client.getBranches({ name: args.name, user: args.user, limit: args.limit });
    return { branches, total_count: branches.length };
  },
});

export const hasBranchTool = defineLakehouseTool({
  description: 'Check whether a branch exists.',
  inputSchema: z
    .object({
      branch: z.string().min(1).describe('Branch name to check'),
    })
    .strict(),
  async execute(args, client) {
    const exists = await client.hasBranch(args.branch);
    return {
      branch_name: args.branch,
      exists,
      message: `Branch '${args.branch}' ${exists ? 'exists' : 'does not exist'}`,
    };
  },
});

export const createBranchTool = defineLakehouseTool({
  description: 'Create a branch from a ref. Branch names follow <username>.<name>.',
  inputSchema: z
    .object({
      branch: z.string().min(1).describe('Name of the new branch'),
      from_ref: z.string().min(1).describe('Ref the branch starts from'),
    })
    .strict(),
  async execute(args, client) {
    const branch = await client.createBranch(args.branch, args.from_ref);
    return {
      created: true,
      name: branch.name,
      hash: branch.hash,
      message: `Branch '${branch.name}' created from '${args.from_ref}'`,
    };
  },
});

export const deleteBranchTool = defineLakehouseTool({
  description: 'Delete a branch. Never targets main.',
  inputSchema: z
    .object({
      branch: z.string().min(1).describe('Branch to delete'),
    })
    .strict(),
  targets: (args) => [{ argument: 'branch', ref: args.branch }],
  async execute(args, client) {
    await client.deleteBranch(args.branch);
    return { deleted: true, branch: args.branch, message: `Branch '${args.branch}' deleted` };
  },
});

export const mergeBranchTool = defineLakehouseTool({
  description: 'Merge a source ref into a branch. Merging into main is left to the user.',
  inputSchema: z
    .object({
      source_ref: z.string().min(1).describe('Ref to merge from'),
      into_branch: z.string().min(1).describe('Branch receiving the merge'),
      commit_message: z.string().optional().describe('Merge commit message'),
      commit_body: z.string().optional().describe('Merge commit body'),
    })
    .strict(),
  targets: (args) => [{ argument: 'into_branch', ref: args.into_branch }],
  async execute(args, client) {
    await client.mergeBranch({
      sourceRef: args.source_ref,
      intoBranch: args.into_branch,
      commitMessage: args.commit_message,
      commitBody: args.commit_body,
    });
    return {
      merged: true,
      source_ref: args.source_ref,
      target_branch: args.into_branch,
      message: `Merged '${args.source_ref}' into '${args.into_branch}'`,
    };
  },
});

function checkIsoDate(argument: string, value: string | undefined): void {
  if (value !== undefined && Number.isNaN(Date.parse(value))) {
    throw new ToolArgumentError(`${argument} must be an ISO date (e.g. 2024-01-31 or 2024-01-31T12:00:00Z), got '${value}'`);
  }
}

export const getCommitsTool = defineLakehouseTool({
  description: 'Get the commit history of a ref, optionally filtered by message, author or date range.',
  inputSchema: z
    .object({
      ref: z.string().min(1).describe('Branch name or commit reference'),
      message_filter: z.string().optional().describe('Only commits whose message matches this pattern'),
      author_username: z.string().optional().describe('Only commits by this username'),
      author_email: z.string().optional().describe('Only commits by this email'),
      date_start: z.string().optional().describe('Only commits authored on or after this ISO date'),
      date_end: z.string().optional().describe('Only commits authored on or before this ISO date'),
      limit: limitSchema.describe('Maximum number of commits to return'),
    })
    .strict(),
  validate(args) {
    checkIsoDate('date_start', args.date_start);
    checkIsoDate('date_end', args.date_end);
  },
  async execute(args, client) {
    const commits = await client.getCommits({
      ref: args.ref,
      messageFilter: args.message_filter,
      authorUsername: args.author_username,
      authorEmail: args.author_email,
      dateStart: args.date_start,
      dateEnd: args.date_end,
      limit: args.limit,
    });
    return {
      commits: commits.map((commit) => ({
        hash: commit.hash,
        message: commit.message,
        author: commit.author,
        authored_date: commit.authoredDate,
        parent_hashes: commit.parentHashes,
      })),
      total_count: commits.length,
    };
  },
});
