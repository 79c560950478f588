import { describe, it, expect } from 'vitest';
import {
  cleanIdentifier,
  detectOperation,
  extractStatement,
  extractTable,
  extractWhereClause,
  findTopLevelKeyword,
} from '../sqlExtractor.js';
import { ParseError } from '../../utils/errors.js';

describe('extractStatement', () => {
  it('decomposes an INSERT into table and typed values', () => {
    const result = extractStatement(
      "INSERT INTO employee (name, department, salary) VALUES ('Sarah', NULL, NULL);"
    );
    expect(result).toEqual({
      table: 'employee',
      operation: 'insert',
      columnValueMap: { name: 'Sarah', department: null, salary: null },
    });
  });

  it('keeps commas and quotes inside literals', () => {
    const result = extractStatement(
      "INSERT INTO project (name, description, budget) VALUES ('Apollo', 'Phase 1, O''Neil''s team', 1500.5)"
    );
    expect(result?.columnValueMap).toEqual({
      name: 'Apollo',
      description: "Phase 1, O'Neil's team",
      budget: 1500.5,
    });
  });

  it('strips quoting and schema prefixes from identifiers', () => {
    const result = extractStatement('INSERT INTO public.employee ("name", salary) VALUES (\'Ann\', 10)');
    expect(result?.table).toBe('employee');
    expect(result?.columnValueMap).toEqual({ name: 'Ann', salary: 10 });
  });

  it('drops the id column from inserts', () => {
    const result = extractStatement("INSERT INTO employee (id, name) VALUES (7, 'Ann')");
    expect(result?.columnValueMap).toEqual({ name: 'Ann' });
  });

  it('rejects a column/value count mismatch', () => {
    expect(() => extractStatement("INSERT INTO employee (name, salary) VALUES ('Ann')")).toThrow(ParseError);
  });

  it('rejects an INSERT without VALUES', () => {
    expect(() => extractStatement('INSERT INTO employee (name) SELECT name FROM project')).toThrow(
      'INSERT for employee has no VALUES list'
    );
  });

  it('decomposes an UPDATE with its predicate', () => {
    const result = extractStatement("UPDATE employee SET salary = 70000, department = 'Sales' WHERE name = 'Sarah';");
    expect(result).toEqual({
      table: 'employee',
      operation: 'update',
      columnValueMap: { salary: 70000, department: 'Sales' },
      whereClause: "name = 'Sarah'",
    });
  });

  it('returns an UPDATE without predicate with no whereClause', () => {
    const result = extractStatement('UPDATE employee SET salary = 1');
    expect(result?.whereClause).toBeUndefined();
  });

  it('rejects a malformed assignment', () => {
    expect(() => extractStatement('UPDATE employee SET salary WHERE id = 1')).toThrow(ParseError);
  });

  it('returns null for statements it does not decompose', () => {
    expect(extractStatement('SELECT * FROM employee')).toBeNull();
    expect(extractStatement("DELETE FROM employee WHERE name = 'Ann'")).toBeNull();
    expect(extractStatement('I could not write that query')).toBeNull();
  });
});

describe('detectOperation', () => {
  it('classifies by leading keyword', () => {
    expect(detectOperation('select 1')).toBe('select');
    expect(detectOperation('WITH x AS (SELECT 1) SELECT * FROM x')).toBe('select');
    expect(detectOperation("INSERT INTO employee (name) VALUES ('a')")).toBe('insert');
    expect(detectOperation('UPDATE employee SET a = 1 WHERE id = 2')).toBe('update');
    expect(detectOperation('DELETE FROM employee WHERE id = 2')).toBe('delete');
    expect(detectOperation('EXPLAIN SELECT 1')).toBe('unknown');
  });

  it('skips leading comments and parentheses', () => {
    expect(detectOperation('-- all staff\n(SELECT * FROM employee)')).toBe('select');
  });
});

describe('extractWhereClause', () => {
  it('returns the predicate without trailing semicolon', () => {
    expect(extractWhereClause("DELETE FROM employee WHERE name = 'Ann';")).toBe("name = 'Ann'");
  });

  it('ignores WHERE inside literals and subqueries', () => {
    expect(extractWhereClause("UPDATE t SET note = 'where' WHERE id IN (SELECT id FROM u WHERE x = 1)")).toBe(
      'id IN (SELECT id FROM u WHERE x = 1)'
    );
  });

  it('cuts a RETURNING clause', () => {
    expect(extractWhereClause('DELETE FROM employee WHERE id = 3 RETURNING name')).toBe('id = 3');
  });

  it('returns null without a predicate', () => {
    expect(extractWhereClause('DELETE FROM employee')).toBeNull();
    expect(extractWhereClause('DELETE FROM employee WHERE ')).toBeNull();
  });
});

describe('extractTable', () => {
  it('finds the table after FROM, INTO or UPDATE', () => {
    expect(extractTable('SELECT * FROM employee WHERE salary > 5')).toBe('employee');
    expect(extractTable("INSERT INTO project (name) VALUES ('x')")).toBe('project');
    expect(extractTable('UPDATE staff SET a = 1')).toBe('staff');
    expect(extractTable('SELECT 1')).toBeNull();
  });
});

describe('identifier helpers', () => {
  it('cleans quoted and bracketed identifiers', () => {
    expect(cleanIdentifier('"Employee"')).toBe('Employee');
    expect(cleanIdentifier('[dbo].[project]')).toBe('project');
    expect(cleanIdentifier(' `name` ')).toBe('name');
  });

  it('finds keywords as whole words only', () => {
    expect(findTopLevelKeyword('SELECT somewhere FROM t', 'WHERE')).toBe(-1);
    expect(findTopLevelKeyword('a WHERE b', 'where')).toBe(2);
  });
});
