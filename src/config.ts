import { Command } from 'commander';
import { z } from 'zod';
import { SERVER_NAME, SERVER_VERSION } from './constants.js';
import { DEFAULT_INSTRUCTIONS_DIR } from './instructions/catalog.js';

export const TRANSPORTS = ['stdio', 'sse', 'streamable-http'] as const;

const serverConfigSchema = z.object({
  transport: z.enum(TRANSPORTS).default('stdio'),
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(1).max(65535).default(8000),
  profile: z.string().optional(),
  cliPath: z.string().min(1).default('bauplan'),
  commandTimeoutMs: z.coerce.number().int().positive().default(300_000),
  instructionsDir: z.string().min(1).default(DEFAULT_INSTRUCTIONS_DIR),
});

export type ServerConfig = z.output<typeof serverConfigSchema>;
export type TransportKind = ServerConfig['transport'];

interface CliOptions {
  transport?: string;
  host?: string;
  port?: string;
  profile?: string;
  cliPath?: string;
  commandTimeoutMs?: string;
  instructionsDir?: string;
}

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
}

export function createProgram(): Command {
  return new Command()
    .name(SERVER_NAME)
    .description('MCP server exposing Bauplan lakehouse operations as tools')
    .version(SERVER_VERSION)
    .option('--transport <transport>', `transport to serve on (${TRANSPORTS.join(', ')}); env MCP_TRANSPORT`)
    .option('--host <host>', 'bind address for HTTP transports; env MCP_HOST')
    .option('--port <port>', 'port for HTTP transports; env MCP_PORT')
    .option('--profile <profile>', 'Bauplan profile used when a call carries no credential header; env BAUPLAN_PROFILE')
    .option('--cli-path <path>', 'path to the bauplan CLI; env BAUPLAN_CLI_PATH')
    .option('--command-timeout-ms <ms>', 'minimum timeout for one CLI invocation; env BAUPLAN_COMMAND_TIMEOUT_MS')
    .option('--instructions-dir <dir>', 'directory holding the instruction documents; env BAUPLAN_INSTRUCTIONS_DIR')
    .exitOverride();
}

/**
 * Builds the immutable server configuration. Command-line flags win over
 * environment variables; blank values count as unset.
 */
export function loadServerConfig(args: string[], env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const program = createProgram();
  program.parse(args, { from: 'user' });
  const options = program.opts<CliOptions>();

  const parsed = serverConfigSchema.safeParse({
    transport: blankToUndefined(options.transport ?? env.MCP_TRANSPORT),
    host: blankToUndefined(options.host ?? env.MCP_HOST),
    port: blankToUndefined(options.port ?? env.MCP_PORT),
    profile: blankToUndefined(options.profile ?? env.BAUPLAN_PROFILE),
    cliPath: blankToUndefined(options.cliPath ?? env.BAUPLAN_CLI_PATH),
    commandTimeoutMs: blankToUndefined(options.commandTimeoutMs ?? env.BAUPLAN_COMMAND_TIMEOUT_MS),
    instructionsDir: blankToUndefined(options.instructionsDir ?? env.BAUPLAN_INSTRUCTIONS_DIR),
  });
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return Object.freeze(parsed.data);
}
