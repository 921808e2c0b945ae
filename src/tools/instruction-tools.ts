import { z } from 'zod';
import type { InstructionCatalog } from '../instructions/catalog.js';
import { USE_CASES } from '../instructions/catalog.js';
import { defineLocalTool, type ToolDefinition } from './types.js';

/** Serves the bundled workflow guides; needs no lakehouse credentials. */
export function createGetInstructionsTool(catalog: InstructionCatalog): ToolDefinition {
  return defineLocalTool({
    description: `Get the step-by-step guidance for a use case. Valid use cases: ${USE_CASES.join(', ')}.`,
    inputSchema: z
      .object({
        use_case: z.string().describe(`One of: ${USE_CASES.join(', ')}`),
      })
      .strict(),
    execute(args) {
      return catalog.getInstructions(args.use_case);
    },
  });
}
