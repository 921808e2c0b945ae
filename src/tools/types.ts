import type { z } from 'zod';
import type { LakehouseClient } from '../clients/lakehouse-client.js';
import type { GuardedTarget } from '../validators/branch-guard.js';

/**
 * A tool call whose arguments have been validated. Local calls never touch
 * the lakehouse; lakehouse calls name the refs they write to so the
 * dispatcher can guard them before a client exists.
 */
export type PreparedCall =
  | { kind: 'local'; run: () => Promise<unknown> }
  | {
      kind: 'lakehouse';
      targets: GuardedTarget[];
      run: (client: LakehouseClient) => Promise<unknown>;
    };

export interface ToolDefinition {
  description: string;
  inputSchema: z.ZodObject;
  /** Parses raw arguments; throws ZodError or a local validation error. */
  prepare(rawArgs: unknown): PreparedCall;
}

export type ToolRegistry = Record<string, ToolDefinition>;

interface LakehouseToolOptions<S extends z.ZodObject> {
  description: string;
  inputSchema: S;
  targets?: (args: z.output<S>) => GuardedTarget[];
  /** Runs after schema parsing and before the guard. */
  validate?: (args: z.output<S>) => void;
  execute: (args: z.output<S>, client: LakehouseClient) => Promise<unknown>;
}

interface LocalToolOptions<S extends z.ZodObject> {
  description: string;
  inputSchema: S;
  execute: (args: z.output<S>) => Promise<unknown> | unknown;
}

export function defineLakehouseTool<S extends z.ZodObject>(options: LakehouseToolOptions<S>): ToolDefinition {
  return {
    description: options.description,
    inputSchema: options.inputSchema,
    prepare(rawArgs) {
      const args = options.inputSchema.parse(rawArgs ?? {});
      options.validate?.(args);
      return {
        kind: 'lakehouse',
        targets: options.targets?.(args) ?? [],
        run: (client) => options.execute(args, client),
      };
    },
  };
}

export function defineLocalTool<S extends z.ZodObject>(options: LocalToolOptions<S>): ToolDefinition {
  return {
    description: options.description,
    inputSchema: options.inputSchema,
    prepare(rawArgs) {
      const args = options.inputSchema.parse(rawArgs ?? {});
      return {
        kind: 'local',
        run: async () => options.execute(args),
      };
    },
  };
}
