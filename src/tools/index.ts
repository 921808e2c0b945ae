import type { InstructionCatalog } from '../instructions/catalog.js';
import { getBranchesTool, hasBranchTool, createBranchTool, deleteBranchTool, mergeBranchTool, getCommitsTool } from './branch-tools.js';
import { createGetInstructionsTool } from './instruction-tools.js';
import { listJobsTool, getJobTool, getJobLogsTool, cancelJobTool } from './job-tools.js';
import { getNamespacesTool, hasNamespaceTool, createNamespaceTool, deleteNamespaceTool } from './namespace-tools.js';
import { runQueryTool, runQueryToCsvTool } from './query-tools.js';
import { projectRunTool, codeRunTool } from './run-tools.js';
import {
  listTablesTool,
  getTableTool,
  getSchemaTool,
  hasTableTool,
  createTableTool,
  planTableCreationTool,
  applyTableCreationPlanTool,
  importDataTool,
  deleteTableTool,
  revertTableTool,
} from './table-tools.js';
import { getTagsTool, hasTagTool, createTagTool, deleteTagTool } from './tag-tools.js';
import type { ToolRegistry } from './types.js';
import { getUserInfoTool } from './user-tools.js';

export function createToolRegistry(catalog: InstructionCatalog): ToolRegistry {
  return {
    get_user_info: getUserInfoTool,

    list_tables: listTablesTool,
    get_table: getTableTool,
    get_schema: getSchemaTool,
    has_table: hasTableTool,
    create_table: createTableTool,
    plan_table_creation: planTableCreationTool,
    apply_table_creation_plan: applyTableCreationPlanTool,
    import_data: importDataTool,
    delete_table: deleteTableTool,
    revert_table: revertTableTool,

    run_query: runQueryTool,
    run_query_to_csv: runQueryToCsvTool,

    get_branches: getBranchesTool,
    has_branch: hasBranchTool,
    create_branch: createBranchTool,
    delete_branch: deleteBranchTool,
    merge_branch: mergeBranchTool,
    get_commits: getCommitsTool,

    get_namespaces: getNamespacesTool,
    has_namespace: hasNamespaceTool,
    create_namespace: createNamespaceTool,
    delete_namespace: deleteNamespaceTool,

    get_tags: getTagsTool,
    has_tag: hasTagTool,
    create_tag: createTagTool,
    delete_tag: deleteTagTool,

    project_run: projectRunTool,
    code_run: codeRunTool,

    list_jobs: listJobsTool,
    get_job: getJobTool,
    get_job_logs: getJobLogsTool,
    cancel_job: cancelJobTool,

    get_instructions: createGetInstructionsTool(catalog),
  };
}
