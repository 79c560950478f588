import { describe, it, expect, vi } from 'vitest';
import { QuerySynthesizer, UNGENERATED, cleanGeneratedSQL } from '../sqlWriter.js';
import { ConversationContextStore } from '../../tools/contextStore.js';
import { SynthesisError } from '../../utils/errors.js';
import type { TextGenerator } from '../../types.js';
import { ScriptedGenerator, loadTestRegistry } from './helpers.js';

const aliases = new Map([
  ['employees', 'employee'],
  ['staff', 'employee'],
]);

describe('cleanGeneratedSQL', () => {
  it('leaves table names inside string literals alone', () => {
    expect(
      cleanGeneratedSQL("UPDATE staff SET department = 'Moved from staff' WHERE name = 'Tom';", aliases)
    ).toBe("UPDATE employee SET department = 'Moved from staff' WHERE name = 'Tom';");
    expect(cleanGeneratedSQL("SELECT * FROM staff WHERE note = 'it''s from employees'", aliases)).toBe(
      "SELECT * FROM employee WHERE note = 'it''s from employees'"
    );
  });

  it('unwraps a fenced block and rewrites aliases', () => {
    expect(cleanGeneratedSQL('```sql\nSELECT * FROM employees;\n```', aliases)).toBe('SELECT * FROM employee;');
  });

  it('drops leading prose and everything after the first statement', () => {
    expect(
      cleanGeneratedSQL("Here is the query: INSERT INTO staff (name) VALUES ('Ann'); SELECT 1", aliases)
    ).toBe("INSERT INTO employee (name) VALUES ('Ann');");
  });

  it('ignores semicolons inside string literals', () => {
    expect(cleanGeneratedSQL("UPDATE employee SET name = 'a;b' WHERE id = 1; DELETE FROM employee")).toBe(
      "UPDATE employee SET name = 'a;b' WHERE id = 1;"
    );
  });

  it('prefers a statement at the start of a line', () => {
    expect(cleanGeneratedSQL('To update the salary:\nUPDATE employee SET salary = 1 WHERE id = 2')).toBe(
      'UPDATE employee SET salary = 1 WHERE id = 2'
    );
  });

  it('returns the sentinel when no statement is present', () => {
    expect(cleanGeneratedSQL('Sorry, I cannot help with that.')).toBe(UNGENERATED);
    expect(cleanGeneratedSQL('')).toBe(UNGENERATED);
  });

  it('leaves unknown names alone', () => {
    expect(cleanGeneratedSQL('SELECT * FROM customers', aliases)).toBe('SELECT * FROM customers');
  });
});

describe('QuerySynthesizer', () => {
  const registry = loadTestRegistry();

  it('cleans the reply and remembers the query', async () => {
    const context = new ConversationContextStore({ recentQueriesCap: 5 });
    const generator = new ScriptedGenerator(['```sql\nSELECT * FROM staff\n```']);
    const synthesizer = new QuerySynthesizer(generator, registry, context, { timeoutMs: 1000 });

    await expect(synthesizer.synthesize('show the staff')).resolves.toBe('SELECT * FROM employee');

    const [recent] = context.snapshot().recentQueries;
    expect(recent.prompt).toBe('show the staff');
    expect(recent.sql).toBe('SELECT * FROM employee');
  });

  it('sends the request, tables and rules to the generator', async () => {
    const generator = new ScriptedGenerator(['SELECT 1']);
    const synthesizer = new QuerySynthesizer(
      generator,
      registry,
      new ConversationContextStore({ recentQueriesCap: 5 }),
      { timeoutMs: 1000 }
    );

    await synthesizer.synthesize('add employee Sarah');

    const [prompt] = generator.prompts;
    expect(prompt).toContain('Available table names: employee, project\n');
    expect(prompt).toContain('User Request: add employee Sarah\n');
    expect(prompt).toContain("4. Include every REQUIRED column in an INSERT; use NULL for any value the user did not give\n");
    expect(prompt).not.toContain('Conversation context:');
  });

  it('includes conversation context once there is some', () => {
    const context = new ConversationContextStore({ recentQueriesCap: 5 });
    context.recordExecution('insert', 'employee', { name: 'Sarah', department: 'HR' }, 'INSERT ...');
    const synthesizer = new QuerySynthesizer(new ScriptedGenerator([]), registry, context, { timeoutMs: 1000 });

    expect(synthesizer.buildPrompt('add another one')).toContain(
      "Conversation context:\n- Last operation: insert on employee\n- Last values: name='Sarah', department='HR'\n"
    );
  });

  it('passes the schema text alongside the prompt', async () => {
    const generate = vi.fn<TextGenerator['generate']>().mockResolvedValue('SELECT name FROM project');
    const synthesizer = new QuerySynthesizer(
      { generate },
      registry,
      new ConversationContextStore({ recentQueriesCap: 5 }),
      { timeoutMs: 1000 }
    );

    await synthesizer.synthesize('list projects', 'Table: project');

    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate.mock.calls[0][1]).toBe('Table: project');
  });

  it('wraps generator failures in SynthesisError', async () => {
    const synthesizer = new QuerySynthesizer(
      new ScriptedGenerator([new Error('quota exceeded')]),
      registry,
      new ConversationContextStore({ recentQueriesCap: 5 }),
      { timeoutMs: 1000 }
    );

    const error = await synthesizer.synthesize('show staff').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SynthesisError);
    expect(error).toHaveProperty('message', 'Failed to generate SQL: quota exceeded');
  });

  it('gives up on a generator that never answers', async () => {
    vi.useFakeTimers();
    try {
      const silent: TextGenerator = { generate: () => new Promise<string>(() => undefined) };
      const synthesizer = new QuerySynthesizer(
        silent,
        registry,
        new ConversationContextStore({ recentQueriesCap: 5 }),
        { timeoutMs: 200 }
      );

      const assertion = expect(synthesizer.synthesize('show staff')).rejects.toThrow(
        'Text generation timed out after 200ms'
      );
      await vi.advanceTimersByTimeAsync(200);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });
});
