import { QueryRejectedError } from '../errors.js';

const FORBIDDEN_KEYWORDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'DROP',
  'CREATE',
  'ALTER',
  'TRUNCATE',
  'REPLACE',
  'MERGE',
  'CALL',
  'EXEC',
  'EXECUTE',
] as const;

export interface QueryValidation {
  valid: boolean;
  errors?: string[];
}

function stripComments(sql: string): string {
  return sql.replace(/--.*$/gm, ' ').replace(/\/\*[\s\S]*?\*\//g, ' ');
}

/**
 * Read-only gate for ad-hoc SQL. Queries must start with SELECT or WITH and
 * may not contain a write or DDL keyword as a whole word.
 */
export function validateReadOnlyQuery(sql: string): QueryValidation {
  const errors: string[] = [];
  const normalized = stripComments(sql).trim().toUpperCase();

  if (normalized.length === 0) {
    errors.push('Query is empty');
    return { valid: false, errors };
  }

  if (!/^(SELECT|WITH)\b/.test(normalized)) {
    errors.push('Only SELECT queries (including CTEs with WITH) are permitted');
  }

  for (const keyword of FORBIDDEN_KEYWORDS) {
    if (new RegExp(`\\b${keyword}\\b`).test(normalized)) {
      errors.push(`Forbidden keyword: ${keyword}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors: errors.length > 0 ? errors : undefined,
  };
}

export function assertReadOnlyQuery(sql: string): void {
  const validation = validateReadOnlyQuery(sql);
  if (!validation.valid) {
    throw new QueryRejectedError(validation.errors ?? []);
  }
}
