import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  InvalidUseCaseError,
  LakehouseCommandError,
  PolicyViolationError,
  QueryRejectedError,
  ToolArgumentError,
  getErrorMessage,
  toMcpError,
} from './errors.js';

describe('toMcpError', () => {
  it('passes McpError through', () => {
    const original = new McpError(ErrorCode.MethodNotFound, 'Tool x not found');
    expect(toMcpError(original)).toBe(original);
  });

  it('maps schema failures to invalid params with the field path', () => {
    const result = z.object({ branch: z.string() }).safeParse({ branch: 42 });
    expect(result.success).toBe(false);
    const error = toMcpError(result.error);
    expect(error.code).toBe(ErrorCode.InvalidParams);
    expect(error.message).toContain('Invalid arguments: branch: ');
  });

  it('maps a policy violation to invalid request with details', () => {
    const error = toMcpError(new PolicyViolationError('merge_branch', 'into_branch', 'main'));
    expect(error.code).toBe(ErrorCode.InvalidRequest);
    expect(error.message).toContain("merge_branch refused because into_branch='main'");
    expect(error.data).toEqual({ tool: 'merge_branch', argument: 'into_branch', ref: 'main' });
  });

  it('maps an unknown use case to invalid params listing the valid keys', () => {
    const error = toMcpError(new InvalidUseCaseError('lineage', ['data', 'ingest']));
    expect(error.code).toBe(ErrorCode.InvalidParams);
    expect(error.message).toContain("Invalid use_case 'lineage', must be one of: data, ingest");
    expect(error.data).toEqual({ valid_use_cases: ['data', 'ingest'] });
  });

  it('maps local argument checks to invalid params', () => {
    expect(toMcpError(new QueryRejectedError(['Forbidden keyword: DROP'])).code).toBe(ErrorCode.InvalidParams);
    expect(toMcpError(new ToolArgumentError('bad date')).code).toBe(ErrorCode.InvalidParams);
  });

  it('keeps upstream messages verbatim', () => {
    const error = toMcpError(new LakehouseCommandError('branch alice.dev not found', 'bauplan branch', 1));
    expect(error.code).toBe(ErrorCode.InternalError);
    expect(error.message).toContain('branch alice.dev not found');
  });
});

describe('getErrorMessage', () => {
  it('reads Error messages and stringifies the rest', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
  });
});
