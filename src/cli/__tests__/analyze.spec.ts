import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { CommanderError } from 'commander';
import { test } from 'uvu';
import * as assert from 'uvu/assert';
import { runAnalysis } from '../analyze';
import { createProgram } from '../index';
import { toDialectSpecs } from '../../server/config';

const workDir = mkdtempSync(join(tmpdir(), 'sql-deps-cli-'));
const sqlDir = join(workDir, 'sql');
const outDir = join(workDir, 'out');

function quietProgram() {
  return createProgram()
    .exitOverride()
    .configureOutput({ writeOut: () => {}, writeErr: () => {} });
}

test.before(() => {
  mkdirSync(sqlDir, { recursive: true });
  writeFileSync(join(sqlDir, 'a.sql'), 'CREATE TABLE x AS SELECT * FROM y\n');
  writeFileSync(join(sqlDir, 'b.sql'), 'INSERT INTO z SELECT * FROM x JOIN w ON x.id = w.id\n');
  writeFileSync(join(sqlDir, 'bad.sql'), 'SELEKT garbage !!!\n');
});

test.after(() => {
  rmSync(workDir, { recursive: true, force: true });
});

test('runAnalysis writes both diagrams and the dialect summary', () => {
  const run = runAnalysis({ sqlDir, outPrefix: 'deps', outDir, dialects: toDialectSpecs(['mysql']) });

  assert.is(run.written.tables, join(outDir, 'deps_tables.mmd'));
  assert.is(readFileSync(run.written.tables, 'utf-8'), 'graph TD\n  n0["y"] --> n1["x"]\n  n1["x"] --> n2["z"]\n  n3["w"] --> n2["z"]\n');
  assert.is(readFileSync(run.written.scripts, 'utf-8'), 'graph TD\n  n0["a.sql"] --> n1["b.sql"]\n');
  assert.is(readFileSync(run.written.dialects, 'utf-8'), 'a.sql: mysql\nb.sql: mysql\nbad.sql: unknown\n');
  assert.is(run.files.length, 3);
});

test('runAnalysis throws for a missing folder before writing anything', () => {
  const missingOut = join(workDir, 'never');
  assert.throws(
    () => runAnalysis({ sqlDir: join(workDir, 'missing'), outPrefix: 'deps', outDir: missingOut, dialects: toDialectSpecs(['mysql']) }),
    /SQL directory not found/
  );
  assert.not.ok(existsSync(missingOut));
});

test('--sql-dir is required', () => {
  assert.throws(
    () => quietProgram().parse(['--out-prefix', 'x'], { from: 'user' }),
    (err: unknown) => err instanceof CommanderError && err.code === 'commander.missingMandatoryOptionValue'
  );
});

test('--dialects rejects unknown grammars', () => {
  assert.throws(
    () => quietProgram().parse(['--sql-dir', sqlDir, '--dialects', 'oracle'], { from: 'user' }),
    (err: unknown) => err instanceof CommanderError && err.code === 'commander.invalidArgument'
  );
});

test('a missing folder sets a failing exit code', () => {
  const previous = process.exitCode;
  quietProgram().parse(['--sql-dir', join(workDir, 'missing'), '--out-dir', outDir], { from: 'user' });
  assert.is(process.exitCode, 1);
  process.exitCode = previous;
});

test('the command line runs end to end with defaults for the remaining options', () => {
  quietProgram().parse(['--sql-dir', sqlDir, '--out-dir', outDir, '--out-prefix', 'cli', '--dialects', 'mysql'], { from: 'user' });
  assert.is(readFileSync(join(outDir, 'cli_scripts.mmd'), 'utf-8'), 'graph TD\n  n0["a.sql"] --> n1["b.sql"]\n');
});

test.run();
