import { test } from 'uvu';
import * as assert from 'uvu/assert';
import { analyzeScript, analyzeScripts } from '../analyzeScripts';
import { DEFAULT_DIALECTS, toDialectSpecs } from '../config';

// Pin the grammar so the asserted tree shapes are deterministic
const mysqlOnly = { dialects: toDialectSpecs(['mysql']), onDiagnostic: () => {} };

const a = { path: 'a.sql', sql: 'CREATE TABLE x AS SELECT * FROM y' };
const b = { path: 'b.sql', sql: 'INSERT INTO z SELECT * FROM x JOIN w ON x.id = w.id' };
const c = { path: 'c.sql', sql: 'SELECT * FROM nonexistent_only' };
const bad = { path: 'bad.sql', sql: 'SELEKT garbage !!!' };

test('CREATE TABLE AS SELECT', () => {
  assert.equal(analyzeScript(a, mysqlOnly), { path: 'a.sql', inputs: ['y'], outputs: ['x'], dialect: 'mysql' });
});

test('INSERT ... SELECT with a join', () => {
  assert.equal(analyzeScript(b, mysqlOnly), { path: 'b.sql', inputs: ['x', 'w'], outputs: ['z'], dialect: 'mysql' });
});

test('read-only script', () => {
  assert.equal(analyzeScript(c, mysqlOnly), { path: 'c.sql', inputs: ['nonexistent_only'], outputs: [], dialect: 'mysql' });
});

test('unparseable script is kept as unknown', () => {
  const messages: string[] = [];
  const file = analyzeScript(bad, { dialects: toDialectSpecs(['mysql']), onDiagnostic: m => messages.push(m) });
  assert.equal(file, { path: 'bad.sql', inputs: [], outputs: [], dialect: 'unknown' });
  assert.is(messages[0], '[WARN] bad.sql: Could not parse SQL under mysql.');
});

test('graphs across scripts, bad files included in the report', () => {
  const result = analyzeScripts([a, b, c, bad], mysqlOnly);
  assert.equal(Array.from(result.tables), [['x', ['y']], ['z', ['x', 'w']]]);
  assert.equal(Array.from(result.scripts), [['b.sql', ['a.sql']]]);
  assert.equal(Array.from(result.dialects), [
    ['a.sql', 'mysql'],
    ['b.sql', 'mysql'],
    ['c.sql', 'mysql'],
    ['bad.sql', 'unknown'],
  ]);
  assert.is(result.files.length, 4);
});

test('default grammar chain picks the first grammar that accepts each script', () => {
  const result = analyzeScripts([a, b, c], { onDiagnostic: () => {} });
  // trino rejects CREATE TABLE ... AS, so postgresql takes it
  assert.is(result.dialects.get('a.sql'), 'postgresql');
  assert.is(result.dialects.get('b.sql'), 'trino');
  assert.ok(DEFAULT_DIALECTS.includes(result.dialects.get('c.sql') ?? 'unknown'));
});

test('quoting variants of one table resolve to the same identity', () => {
  const result = analyzeScripts(
    [
      { path: 'double.sql', sql: 'SELECT * FROM "S"."T"' },
      { path: 'mixed.sql', sql: 'SELECT * FROM S."T"' },
      { path: 'backticks.sql', sql: 'SELECT * FROM `S`.`T`' },
    ],
    { onDiagnostic: () => {} }
  );
  assert.equal(result.files.map(file => file.inputs), [['S.T'], ['S.T'], ['S.T']]);
});

test.run();
