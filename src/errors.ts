import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';

export class PolicyViolationError extends Error {
  constructor(
    readonly tool: string,
    readonly argument: string,
    readonly ref: string
  ) {
    super(
      `Policy violation: ${tool} refused because ${argument}='${ref}' is the protected production branch. ` +
        `Work on a <username>.<name> branch instead.`
    );
    this.name = 'PolicyViolationError';
  }
}

export class InvalidUseCaseError extends Error {
  constructor(
    readonly useCase: string,
    readonly validUseCases: readonly string[]
  ) {
    super(`Invalid use_case '${useCase}', must be one of: ${validUseCases.join(', ')}`);
    this.name = 'InvalidUseCaseError';
  }
}

export class QueryRejectedError extends Error {
  constructor(readonly reasons: string[]) {
    super(`Query rejected: ${reasons.join('; ')}`);
    this.name = 'QueryRejectedError';
  }
}

/** Argument problems a tool finds after schema validation, e.g. a bad date. */
export class ToolArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolArgumentError';
  }
}

/** A lakehouse CLI invocation that exited non-zero. `message` is the CLI's own output. */
export class LakehouseCommandError extends Error {
  constructor(
    message: string,
    readonly command: string,
    readonly exitCode: number | undefined
  ) {
    super(message);
    this.name = 'LakehouseCommandError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Maps an error raised while serving a tool call onto the MCP error taxonomy.
 * Upstream failures keep their message as-is.
 */
export function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }
  if (error instanceof ZodError) {
    return new McpError(ErrorCode.InvalidParams, `Invalid arguments: ${formatZodError(error)}`);
  }
  if (error instanceof PolicyViolationError) {
    return new McpError(ErrorCode.InvalidRequest, error.message, {
      tool: error.tool,
      argument: error.argument,
      ref: error.ref,
    });
  }
  if (error instanceof InvalidUseCaseError) {
    return new McpError(ErrorCode.InvalidParams, error.message, {
      valid_use_cases: error.validUseCases,
    });
  }
  if (error instanceof QueryRejectedError || error instanceof ToolArgumentError) {
    return new McpError(ErrorCode.InvalidParams, error.message);
  }
  return new McpError(ErrorCode.InternalError, getErrorMessage(error));
}
