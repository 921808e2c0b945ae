import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SERVER_INSTRUCTIONS } from './constants.js';
import { LakehouseCommandError } from './errors.js';
import { InstructionCatalog, type UseCase } from './instructions/catalog.js';
import { createServer, dispatchToolCall, type ServerDependencies } from './server.js';
import { FakeLakehouse } from './testing/fake-lakehouse.js';
import { createToolRegistry } from './tools/index.js';

const catalog = new InstructionCatalog({
  data: '# data guide\n',
  ingest: '# ingest guide\n',
  pipeline: '# pipeline guide\n',
  repair: '# repair guide\n',
  test: '# test guide\n',
  sdk: '# sdk guide\n',
} satisfies Record<UseCase, string>);

async function rejection(promise: Promise<unknown>): Promise<McpError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof McpError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the call to fail');
}

function textOf(result: { content: unknown[] }): string {
  const [first] = result.content;
  if (typeof first === 'object' && first !== null && 'text' in first && typeof first.text === 'string') {
    return first.text;
  }
  throw new Error('expected a text content block');
}

describe('dispatchToolCall', () => {
  let lakehouse: FakeLakehouse;
  let deps: ServerDependencies;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    lakehouse = new FakeLakehouse();
    deps = { tools: createToolRegistry(catalog), clientFactory: lakehouse.factory, profile: 'dev' };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('credential resolution', () => {
    it('builds the client from the request header when one is present', async () => {
      const result = await dispatchToolCall(deps, 'get_user_info', {}, { bauplan: 'sk-test-123' });

      expect(lakehouse.configs).toEqual([{ source: 'api_key', apiKey: 'sk-test-123' }]);
      expect(textOf(result)).toBe(JSON.stringify({ username: 'test-user', full_name: 'Test User' }, null, 2));
    });

    it('uses the server profile without a header', async () => {
      await dispatchToolCall(deps, 'get_user_info', {}, {});

      expect(lakehouse.configs).toEqual([{ source: 'profile', profile: 'dev' }]);
    });

    it('uses the host default without a header or profile', async () => {
      await dispatchToolCall({ ...deps, profile: undefined }, 'get_user_info', {});

      expect(lakehouse.configs).toEqual([{ source: 'default' }]);
    });

    it('resolves a fresh config per call', async () => {
      await dispatchToolCall(deps, 'get_user_info', {}, { Bauplan: 'Bearer sk-test-1' });
      await dispatchToolCall(deps, 'get_user_info', {});

      expect(lakehouse.configs).toEqual([
        { source: 'api_key', apiKey: 'sk-test-1' },
        { source: 'profile', profile: 'dev' },
      ]);
    });
  });

  describe('protected branch', () => {
    const refused: Array<[string, Record<string, unknown>]> = [
      ['delete_branch', { branch: 'main' }],
      ['delete_table', { table: 'orders', branch: 'main' }],
      ['delete_namespace', { namespace: 'sales', branch: 'main' }],
      ['delete_tag', { tag: 'main' }],
      ['merge_branch', { source_ref: 'alice.dev', into_branch: 'main' }],
      ['revert_table', { table: 'orders', source_ref: '@' + 'f'.repeat(64), into_branch: 'main' }],
      ['create_table', { table: 'orders', search_uri: 's3://test-bucket/orders/*.parquet', branch: 'main' }],
      ['plan_table_creation', { table: 'orders', search_uri: 's3://test-bucket/orders/*.parquet', branch: 'main' }],
      ['apply_table_creation_plan', { plan: { branch: 'main', table: 'orders' } }],
      ['import_data', { table: 'orders', search_uri: 's3://test-bucket/orders/*.parquet', branch: 'main' }],
      ['create_namespace', { namespace: 'sales', branch: 'main' }],
      ['project_run', { project_dir: '/srv/project', ref: 'main' }],
      ['code_run', { project_files: { 'bauplan_project.yml': 'project: {}' }, ref: 'main' }],
    ];

    it.each(refused)('refuses %s on main before building a client', async (tool, args) => {
      const error = await rejection(dispatchToolCall(deps, tool, args, { bauplan: 'sk-test-123' }));

      expect(error.code).toBe(ErrorCode.InvalidRequest);
      expect(error.message).toContain(`${tool} refused because`);
      expect(error.message).toContain("='main'");
      expect(lakehouse.configs).toEqual([]);
      expect(lakehouse.calls).toEqual([]);
    });

    it('lets the same operation through on a user branch', async () => {
      await dispatchToolCall(deps, 'delete_branch', { branch: 'alice.dev' });

      expect(lakehouse.calls).toEqual([{ method: 'deleteBranch', args: ['alice.dev'] }]);
    });

    it('matches the branch name exactly', async () => {
      await dispatchToolCall(deps, 'merge_branch', { source_ref: 'alice.dev', into_branch: 'Main' });

      expect(lakehouse.methodsCalled()).toEqual(['mergeBranch']);
    });

    it('allows a dry run against main', async () => {
      await dispatchToolCall(deps, 'project_run', { project_dir: '/srv/project', ref: 'main', dry_run: true });

      expect(lakehouse.methodsCalled()).toEqual(['run']);
    });

    it('allows reads of main', async () => {
      await dispatchToolCall(deps, 'list_tables', { ref: 'main' });

      expect(lakehouse.calls).toEqual([{ method: 'getTables', args: ['main', undefined] }]);
    });

    const branchless: Array<[string, Record<string, unknown>]> = [
      ['import_data', { table: 'orders', search_uri: 's3://test-bucket/orders/*.parquet' }],
      ['plan_table_creation', { table: 'orders', search_uri: 's3://test-bucket/orders/*.parquet' }],
      ['apply_table_creation_plan', { plan: { table: 'orders' } }],
      ['apply_table_creation_plan', { plan: { branch: 42, table: 'orders' } }],
    ];

    it.each(branchless)('refuses %s without a target branch', async (tool, args) => {
      const error = await rejection(dispatchToolCall(deps, tool, args, { bauplan: 'sk-test-123' }));

      expect(error.code).toBe(ErrorCode.InvalidParams);
      expect(lakehouse.configs).toEqual([]);
      expect(lakehouse.calls).toEqual([]);
    });
  });

  describe('get_instructions', () => {
    it('returns the document verbatim without resolving credentials', async () => {
      const result = await dispatchToolCall(deps, 'get_instructions', { use_case: 'pipeline' }, { bauplan: 'sk-test-123' });

      expect(textOf(result)).toBe('# pipeline guide\n');
      expect(lakehouse.configs).toEqual([]);
    });

    it('returns identical text on repeated calls', async () => {
      const first = await dispatchToolCall(deps, 'get_instructions', { use_case: 'wap' });
      const second = await dispatchToolCall(deps, 'get_instructions', { use_case: 'ingest' });

      expect(textOf(first)).toBe('# ingest guide\n');
      expect(textOf(second)).toBe(textOf(first));
    });

    it('rejects an unknown use case with the valid keys', async () => {
      const error = await rejection(dispatchToolCall(deps, 'get_instructions', { use_case: 'lineage' }));

      expect(error.code).toBe(ErrorCode.InvalidParams);
      expect(error.message).toContain('must be one of: data, ingest, pipeline, repair, test, sdk');
      expect(lakehouse.configs).toEqual([]);
    });
  });

  describe('local failures', () => {
    it('reports an unknown tool', async () => {
      const error = await rejection(dispatchToolCall(deps, 'drop_everything', {}));

      expect(error.code).toBe(ErrorCode.MethodNotFound);
    });

    it('does not resolve prototype keys as tools', async () => {
      const error = await rejection(dispatchToolCall(deps, 'toString', {}));

      expect(error.code).toBe(ErrorCode.MethodNotFound);
    });

    it('rejects invalid arguments before building a client', async () => {
      const error = await rejection(dispatchToolCall(deps, 'get_branches', { limit: 'ten' }));

      expect(error.code).toBe(ErrorCode.InvalidParams);
      expect(error.message).toContain('Invalid arguments: limit');
      expect(lakehouse.configs).toEqual([]);
    });

    it('rejects unexpected arguments', async () => {
      const error = await rejection(dispatchToolCall(deps, 'has_tag', { tag: 'v1', api_key: 'sk-test-123' }));

      expect(error.code).toBe(ErrorCode.InvalidParams);
    });

    it('rejects write queries before building a client', async () => {
      const error = await rejection(dispatchToolCall(deps, 'run_query', { query: 'DELETE FROM orders' }));

      expect(error.code).toBe(ErrorCode.InvalidParams);
      expect(error.message).toContain('Forbidden keyword: DELETE');
      expect(lakehouse.configs).toEqual([]);
    });
  });

  describe('upstream failures', () => {
    it('passes the upstream message through unchanged', async () => {
      lakehouse.failure = new LakehouseCommandError('Branch not found: alice.gone', 'bauplan branch', 1);

      const error = await rejection(dispatchToolCall(deps, 'has_branch', { branch: 'alice.gone' }));

      expect(error.code).toBe(ErrorCode.InternalError);
      expect(error.message).toContain('Branch not found: alice.gone');
      expect(lakehouse.calls).toHaveLength(1);
    });

    it('never logs the API key', async () => {
      lakehouse.failure = new Error('unauthorized');

      await rejection(dispatchToolCall(deps, 'get_user_info', {}, { bauplan: 'sk-test-123' }));

      expect(console.error).toHaveBeenCalledWith(
        '[bauplan-mcp-server] Tool get_user_info failed (api key from request header): unauthorized'
      );
    });
  });

  describe('tool behaviour', () => {
    it('checks an unqualified table in the default namespace', async () => {
      await dispatchToolCall(deps, 'has_table', { table: 'orders', ref: 'main' });

      expect(lakehouse.calls).toEqual([{ method: 'hasTable', args: ['bauplan.orders', 'main'] }]);
    });

    it('qualifies table names with the default namespace', async () => {
      lakehouse.tables = [{ name: 'orders', namespace: 'bauplan', fields: [{ name: 'id', type: 'long' }] }];

      const result = await dispatchToolCall(deps, 'get_table', { ref: 'main', table_name: 'orders' });

      expect(lakehouse.calls).toEqual([{ method: 'getTable', args: ['bauplan.orders', 'main'] }]);
      expect(JSON.parse(textOf(result))).toEqual({
        name: 'orders',
        namespace: 'bauplan',
        fields: [{ name: 'id', type: 'long' }],
      });
    });

    it('reads every table schema of a namespace', async () => {
      lakehouse.tables = [
        { name: 'orders', namespace: 'sales', fields: [{ name: 'id', type: 'long' }] },
        { name: 'customers', namespace: 'sales', fields: [{ name: 'email', type: 'string' }] },
        { name: 'events', namespace: 'bauplan', fields: [] },
      ];

      const result = await dispatchToolCall(deps, 'get_schema', { ref: 'alice.dev', namespace: 'sales' });

      expect(lakehouse.methodsCalled()).toEqual(['getTables', 'getTable', 'getTable']);
      expect(JSON.parse(textOf(result))).toEqual({
        tables: [
          { name: 'orders', namespace: 'sales', fields: [{ name: 'id', type: 'long' }] },
          { name: 'customers', namespace: 'sales', fields: [{ name: 'email', type: 'string' }] },
        ],
        total_count: 2,
      });
    });

    it('returns query rows with metadata', async () => {
      lakehouse.queryResult = {
        columns: [
          { name: 'day', type: 'date32[day]' },
          { name: 'total', type: 'double' },
        ],
        rows: [{ day: '2024-01-01', total: 12.5 }],
      };

      const result = await dispatchToolCall(deps, 'run_query', { query: 'SELECT day, total FROM daily', ref: 'alice.dev' });

      expect(lakehouse.calls).toEqual([
        { method: 'query', args: [{ query: 'SELECT day, total FROM daily', ref: 'alice.dev', namespace: 'bauplan' }] },
      ]);
      expect(JSON.parse(textOf(result))).toMatchObject({
        status: 'success',
        data: [{ day: '2024-01-01', total: 12.5 }],
        metadata: { row_count: 1, column_names: ['day', 'total'], column_types: ['date32[day]', 'double'] },
        error: null,
      });
    });

    it('applies list defaults', async () => {
      await dispatchToolCall(deps, 'get_branches', { user: 'alice' });

      expect(lakehouse.calls).toEqual([
        { method: 'getBranches', args: [{ name: undefined, user: 'alice', limit: 10 }] },
      ]);
    });

    it('rejects a non-ISO commit date', async () => {
      const error = await rejection(dispatchToolCall(deps, 'get_commits', { ref: 'main', date_start: 'last tuesday' }));

      expect(error.code).toBe(ErrorCode.InvalidParams);
      expect(lakehouse.configs).toEqual([]);
    });
  });
});

describe('createServer', () => {
  let client: Client;
  let lakehouse: FakeLakehouse;

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    lakehouse = new FakeLakehouse();
    const server = createServer({ tools: createToolRegistry(catalog), clientFactory: lakehouse.factory });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: 'test-client', version: '1.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    vi.restoreAllMocks();
  });

  it('advertises the usage instructions', () => {
    expect(client.getInstructions()).toBe(SERVER_INSTRUCTIONS);
  });

  it('lists every tool with an object input schema', async () => {
    const { tools } = await client.listTools();

    expect(tools).toHaveLength(34);
    expect(tools.map((tool) => tool.name)).toEqual(expect.arrayContaining(['get_instructions', 'delete_branch', 'code_run']));
    const instructions = tools.find((tool) => tool.name === 'get_instructions');
    expect(instructions?.inputSchema).toMatchObject({
      type: 'object',
      properties: { use_case: { type: 'string' } },
      required: ['use_case'],
    });
  });

  it('marks defaulted arguments as optional', async () => {
    const { tools } = await client.listTools();
    const branches = tools.find((tool) => tool.name === 'get_branches');

    expect(branches?.inputSchema.required).toEqual([]);
    expect(branches?.inputSchema.properties).toHaveProperty('limit');
  });

  it('serves tool calls', async () => {
    const result = await client.callTool({ name: 'get_instructions', arguments: { use_case: 'SDK' } });

    expect(result.content).toEqual([{ type: 'text', text: '# sdk guide\n' }]);
  });

  it('returns policy violations as protocol errors', async () => {
    const error = await rejection(client.callTool({ name: 'delete_branch', arguments: { branch: 'main' } }));

    expect(error.code).toBe(ErrorCode.InvalidRequest);
    expect(lakehouse.calls).toEqual([]);
  });
});
