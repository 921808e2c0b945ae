import { z } from 'zod';
import { DEFAULT_LIST_LIMIT } from '../constants.js';
import { defineLakehouseTool } from './types.js';

export const getTagsTool = defineLakehouseTool({
  description: 'List tags, optionally filtered by name.',
  inputSchema: z
    .object({
      filter_by_name: z.string().optional().describe('Only tags whose name matches'),
      limit: z.number().int().positive().default(DEFAULT_LIST_LIMIT).describe('Maximum number of tags to return'),
    })
    .strict(),
  async execute(args, client) {
    const tags = await client.getTags({ name: args.filter_by_name, limit: args.limit });
    return { tags: tags.map((tag) => ({ name: tag.name })), total_count: tags.length };
  },
});

export const hasTagTool = defineLakehouseTool({
  description: 'Check whether a tag exists.',
  inputSchema: z
    .object({
      tag: z.string().min(1).describe('Tag name to check'),
    })
    .strict(),
  async execute(args, client) {
    const exists = await client.hasTag(args.tag);
    return {
      tag_name: args.tag,
      exists,
      message: `Tag '${args.tag}' ${exists ? 'exists' : 'does not exist'}`,
    };
  },
});

export const createTagTool = defineLakehouseTool({
  description: 'Create a tag pointing at a ref.',
  inputSchema: z
    .object({
      tag: z.string().min(1).describe('Name of the new tag'),
      from_ref: z.string().min(1).describe('Ref the tag points at'),
    })
    .strict(),
  async execute(args, client) {
    const tag = await client.createTag(args.tag, args.from_ref);
    return {
      created: true,
      tag: tag.name,
      from_ref: args.from_ref,
      message: `Tag '${tag.name}' created at '${args.from_ref}'`,
    };
  },
});

export const deleteTagTool = defineLakehouseTool({
  description: 'Delete a tag. A tag named main is refused.',
  inputSchema: z
    .object({
      tag: z.string().min(1).describe('Tag to delete'),
    })
    .strict(),
  targets: (args) => [{ argument: 'tag', ref: args.tag }],
  async execute(args, client) {
    await client.deleteTag(args.tag);
    return { deleted: true, tag: args.tag, message: `Tag '${args.tag}' deleted` };
  },
});
