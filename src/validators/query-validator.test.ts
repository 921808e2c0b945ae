import { describe, it, expect } from 'vitest';
import { QueryRejectedError } from '../errors.js';
import { assertReadOnlyQuery, validateReadOnlyQuery } from './query-validator.js';

describe('validateReadOnlyQuery', () => {
  it('accepts SELECT and WITH queries in any case', () => {
    expect(validateReadOnlyQuery('SELECT * FROM bauplan.orders LIMIT 10')).toEqual({ valid: true, errors: undefined });
    expect(validateReadOnlyQuery('with t as (select 1 as n) select n from t').valid).toBe(true);
  });

  it('ignores comments', () => {
    expect(validateReadOnlyQuery('-- daily check\nSELECT 1').valid).toBe(true);
    expect(validateReadOnlyQuery('/* DELETE this later */ SELECT 1').valid).toBe(true);
  });

  it('does not reject identifiers that merely contain a keyword', () => {
    expect(validateReadOnlyQuery('SELECT created_at, updated_at, replaced_by FROM t').valid).toBe(true);
  });

  it('rejects write statements', () => {
    expect(validateReadOnlyQuery('DELETE FROM t')).toEqual({
      valid: false,
      errors: ['Only SELECT queries (including CTEs with WITH) are permitted', 'Forbidden keyword: DELETE'],
    });
  });

  it('rejects a forbidden keyword after a SELECT', () => {
    expect(validateReadOnlyQuery('select 1; drop table t')).toEqual({
      valid: false,
      errors: ['Forbidden keyword: DROP'],
    });
  });

  it('rejects empty and comment-only queries', () => {
    expect(validateReadOnlyQuery('   ')).toEqual({ valid: false, errors: ['Query is empty'] });
    expect(validateReadOnlyQuery('-- nothing here')).toEqual({ valid: false, errors: ['Query is empty'] });
  });
});

describe('assertReadOnlyQuery', () => {
  it('throws with every reason joined', () => {
    expect(() => assertReadOnlyQuery('CREATE TABLE t AS SELECT 1')).toThrow(
      new QueryRejectedError([
        'Only SELECT queries (including CTEs with WITH) are permitted',
        'Forbidden keyword: CREATE',
      ])
    );
  });

  it('returns quietly for a read-only query', () => {
    expect(() => assertReadOnlyQuery('SELECT 1')).not.toThrow();
  });
});
