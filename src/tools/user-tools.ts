import { z } from 'zod';
import { defineLakehouseTool } from './types.js';

export const getUserInfoTool = defineLakehouseTool({
  description:
    'Get the username and full name of the authenticated user. Call this first: branch names start with the username.',
  inputSchema: z.object({}).strict(),
  async execute(_args, client) {
    const user = await client.info();
    return { username: user.username, full_name: user.fullName };
  },
});
