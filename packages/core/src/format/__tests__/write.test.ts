import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { formatResult } from '../write.js';
import { IOError } from '../../errors.js';
import type { Sink } from '../sink.js';
import { createLogger } from '../../log.js';
import { expectErr, expectOk, memoryStream } from '../../__tests__/helpers.js';

const stdoutTarget = { kind: 'stdout' } as const;

function withTempDir(fn: (dir: string) => Promise<void>): () => Promise<void> {
  return async () => {
    const dir = mkdtempSync(join(tmpdir(), 'gabi-format-test-'));
    try {
      await fn(dir);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  };
}

describe('formatResult to stdout', () => {
  it('writes quote-all CSV with the default tab separator', async () => {
    const out = memoryStream();
    const summary = expectOk(
      await formatResult(stdoutTarget, { rows: [['1']] }, { separator: '\t', asCsv: true, stdout: out.stream }),
    );
    assert.equal(out.text(), '"1"\r\n');
    assert.deepEqual(summary, { rowsWritten: 1, destination: 'standard output' });
  });

  it('writes several rows with a custom separator', async () => {
    const out = memoryStream();
    await formatResult(
      stdoutTarget,
      { rows: [['a', 'b'], ['c,d', null]] },
      { separator: ',', asCsv: true, stdout: out.stream },
    );
    assert.equal(out.text(), '"a","b"\r\n"c,d",""\r\n');
  });

  it('writes the rows verbatim as JSON when CSV is off', async () => {
    const out = memoryStream();
    await formatResult(stdoutTarget, { rows: [['1']] }, { separator: '\t', asCsv: false, stdout: out.stream });
    assert.equal(out.text(), '[["1"]]');
  });

  it('keeps JSON structure for mixed cells', async () => {
    const out = memoryStream();
    const rows = [['x', 1, null, true, { nested: ['y'] }]];
    await formatResult(stdoutTarget, { rows }, { separator: '\t', asCsv: false, stdout: out.stream });
    assert.deepEqual(JSON.parse(out.text()), rows);
  });

  it('writes nothing for a null result and says so', async () => {
    const out = memoryStream();
    const log: string[] = [];
    const summary = expectOk(
      await formatResult(
        stdoutTarget,
        { rows: null },
        { separator: '\t', asCsv: true, stdout: out.stream, logger: createLogger('normal', (line) => log.push(line)) },
      ),
    );
    assert.equal(out.text(), '');
    assert.deepEqual(summary, { rowsWritten: 0, destination: null });
    assert.deepEqual(log, ['Query returned no result set; nothing written.\n']);
  });

  it('writes [] for an empty result in JSON mode', async () => {
    const out = memoryStream();
    await formatResult(stdoutTarget, { rows: [] }, { separator: '\t', asCsv: false, stdout: out.stream });
    assert.equal(out.text(), '[]');
  });
});

describe('formatResult to a file', () => {
  it(
    'writes the file and leaves stdout alone',
    withTempDir(async (dir) => {
      const path = join(dir, 'out.csv');
      const out = memoryStream();
      const summary = expectOk(
        await formatResult(
          { kind: 'file', path },
          { rows: [['id', 'name'], ['7', 'O"Brien']] },
          { separator: ';', asCsv: true, stdout: out.stream },
        ),
      );
      assert.equal(readFileSync(path, 'utf-8'), '"id";"name"\r\n"7";"O""Brien"\r\n');
      assert.equal(out.text(), '');
      assert.deepEqual(summary, { rowsWritten: 2, destination: path });
    }),
  );

  it(
    'truncates an existing file',
    withTempDir(async (dir) => {
      const path = join(dir, 'out.json');
      writeFileSync(path, 'stale contents that are longer than the result', 'utf-8');
      const out = memoryStream();
      await formatResult({ kind: 'file', path }, { rows: [[1]] }, { separator: '\t', asCsv: false, stdout: out.stream });
      assert.equal(readFileSync(path, 'utf-8'), '[[1]]');
    }),
  );

  it(
    'does not create the file for a null result',
    withTempDir(async (dir) => {
      const path = join(dir, 'never.csv');
      const out = memoryStream();
      expectOk(await formatResult({ kind: 'file', path }, { rows: null }, { separator: '\t', asCsv: true, stdout: out.stream }));
      assert.equal(existsSync(path), false);
    }),
  );

  it(
    'creates an empty file for zero CSV rows',
    withTempDir(async (dir) => {
      const path = join(dir, 'empty.csv');
      const out = memoryStream();
      expectOk(await formatResult({ kind: 'file', path }, { rows: [] }, { separator: '\t', asCsv: true, stdout: out.stream }));
      assert.equal(readFileSync(path, 'utf-8'), '');
    }),
  );

  it(
    'fails with an IOError naming the path when the file cannot be opened',
    withTempDir(async (dir) => {
      const path = join(dir, 'missing-dir', 'out.csv');
      const out = memoryStream();
      const error = expectErr(
        await formatResult({ kind: 'file', path }, { rows: [['1']] }, { separator: '\t', asCsv: true, stdout: out.stream }),
      );
      assert.ok(error instanceof IOError);
      assert.equal(error.path, path);
      assert.match(error.message, /^Cannot open .*out\.csv for writing: /);
    }),
  );
});

describe('formatResult after the sink is acquired', () => {
  class FailingSink implements Sink {
    readonly description = 'failing sink';
    readonly written: string[] = [];
    closeCalls = 0;

    constructor(private readonly failOnWrite: number) {}

    async write(chunk: string): Promise<void> {
      if (this.written.length + 1 === this.failOnWrite) {
        throw new Error('disk full');
      }
      this.written.push(chunk);
    }

    async close(): Promise<void> {
      this.closeCalls += 1;
    }
  }

  it('closes the sink and returns an IOError when a write fails', async () => {
    const sink = new FailingSink(2);
    const error = expectErr(
      await formatResult(
        stdoutTarget,
        { rows: [['1'], ['2'], ['3']] },
        { separator: '\t', asCsv: true, stdout: memoryStream().stream, openSink: async () => sink },
      ),
    );
    assert.ok(error instanceof IOError);
    assert.equal(error.message, 'disk full');
    assert.deepEqual(sink.written, ['"1"\r\n']);
    assert.equal(sink.closeCalls, 1);
  });

  it('closes the sink once on success', async () => {
    const sink = new FailingSink(0);
    expectOk(
      await formatResult(
        stdoutTarget,
        { rows: [['1'], ['2']] },
        { separator: ',', asCsv: true, stdout: memoryStream().stream, openSink: async () => sink },
      ),
    );
    assert.deepEqual(sink.written, ['"1"\r\n', '"2"\r\n']);
    assert.equal(sink.closeCalls, 1);
  });

  it('reports a close failure when every write succeeded', async () => {
    const sink: Sink = {
      description: 'unclosable',
      write: async () => {},
      close: async () => {
        throw new IOError('Failed to close unclosable: EIO', { path: 'unclosable' });
      },
    };
    const error = expectErr(
      await formatResult(
        stdoutTarget,
        { rows: [['1']] },
        { separator: ',', asCsv: false, stdout: memoryStream().stream, openSink: async () => sink },
      ),
    );
    assert.equal(error.message, 'Failed to close unclosable: EIO');
    assert.equal(error.path, 'unclosable');
  });
});
