export const SERVER_NAME = 'bauplan-mcp-server';
export const SERVER_VERSION = '0.3.0';

/** Production branch. Destructive tools never target it. */
export const PROTECTED_REF = 'main';

/** Per-call credential header. HTTP header names are case-insensitive. */
export const CREDENTIAL_HEADER = 'Bauplan';

export const DEFAULT_NAMESPACE = 'bauplan';
export const DEFAULT_LIST_LIMIT = 10;
export const DEFAULT_CLIENT_TIMEOUT_SECONDS = 120;

export const SERVER_INSTRUCTIONS = `The Bauplan MCP Server exposes operations for interacting with a Bauplan data lakehouse: querying data at any point in time, running data pipelines as DAGs of SQL and Python functions, Git-style data versioning, and inspecting table history.

The main use cases are:
1) 'data' - descriptive data tasks and lineage questions
2) 'ingest' - data ingestion from S3 with the Write-Audit-Publish (WAP) pattern
3) 'pipeline' - writing a transformation pipeline as a Bauplan project and running it
4) 'repair' - repairing broken pipelines
5) 'test' - creating and managing data expectations and quality tests
6) 'sdk' - explaining Bauplan SDK methods and checking their usage

Once the task is understood, call get_instructions with the matching use_case and follow the returned guidance while planning. get_instructions can be called as many times as needed.

IMPORTANT: if you have been configured with a custom "Bauplan" header, send it with every tool call. Otherwise the server uses its configured profile.

IMPORTANT: most operations need the user's name (branches are named <username>.<name>). Call get_user_info first.

IMPORTANT: the branch "main" holds production data. Tools that delete, merge into, revert into, write to, or run against "main" are refused by this server. Do all work on a <username>.<name> branch and leave publishing to main to the user.

CONCEPTS:
- Branch: a mutable pointer to the latest commit of a line of work, named <username>.<name> except for "main".
- Commit: an immutable snapshot of the lake, referenced as "@" followed by a 64-character hex hash.
- Ref: a commit reference or a branch name (resolved to its head).
- Namespace: a logical container grouping tables. The default namespace is "bauplan".
- Tag: a label pointing at a commit, e.g. v1.0-passed-qa.
- Table: a versioned dataset named <namespace>.<name>.

Use the DuckDB SQL dialect for queries, without DESCRIBE or CREATE. Use get_table for the schema of one table, get_schema for every table in a ref, list_tables to list tables.

TABLE CREATION: prefer create_table when the files under the S3 URI share one schema. When create_table fails on schema conflicts, use plan_table_creation, edit the returned plan, then apply_table_creation_plan.`;
