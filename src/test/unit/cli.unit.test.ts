/**
 * @fileoverview Unit tests for the command line entry point.
 */

import * as assert from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CliIo, EXIT_CODES, formatEvent, main, runReviewCommand } from '../../cli';
import { createContainer } from '../../composition';
import { ObjectConfigProvider } from '../../core/configProvider';
import type { ServiceContainer } from '../../core/container';
import { Logger } from '../../core/logger';
import type { ReviewEvent } from '../../events/types';

suite('CLI', () => {
  let tmpDir: string;
  let out: string[];
  let err: string[];
  let io: CliIo;

  setup(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'review-cli-'));
    out = [];
    err = [];
    io = {
      stdout: text => {
        out.push(text);
      },
      stderr: text => {
        err.push(text);
      },
    };
  });

  teardown(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    Logger.reset();
  });

  function writeSource(name: string, content: string): string {
    const file = path.join(tmpDir, name);
    fs.writeFileSync(file, content, 'utf8');
    return file;
  }

  function testContainer(): ServiceContainer {
    return createContainer({
      configProvider: new ObjectConfigProvider({
        retry: { baseDelayMs: 0, maxDelayMs: 0 },
        logging: { level: 'error' },
      }),
    });
  }

  suite('formatEvent', () => {
    test('formats known events with their details', () => {
      const event: ReviewEvent = {
        eventType: 'fix_rejected',
        sourceId: 'coordinator',
        sequence: 4,
        timestamp: 1,
        payload: { fixId: 'x-1', findingId: 'ghost', stepId: 's1', reason: 'Fix x-1 references unknown finding ghost' },
      };
      assert.strictEqual(formatEvent(event), '[coordinator#4] fix_rejected: Fix x-1 references unknown finding ghost');
    });

    test('falls back to source and type', () => {
      const event: ReviewEvent = {
        eventType: 'thinking',
        sourceId: 'bug',
        sequence: 2,
        timestamp: 1,
        payload: { stepId: 's2', attempt: 1, agentId: 'bug_agent', content: 'hmm' },
      };
      assert.strictEqual(formatEvent(event), '[bug#2] thinking');
    });
  });

  suite('runReviewCommand', () => {
    test('prints the report and exits 0 for a completed review', async () => {
      const file = writeSource('sample.py', 'import os\nos.system(cmd)\n');

      const code = await runReviewCommand(file, {}, { io, container: testContainer() });

      assert.strictEqual(code, EXIT_CODES.completed);
      const lines = out.join('').split('\n');
      assert.match(lines[0], /^Review [0-9a-f-]{36}: completed$/);
      assert.deepStrictEqual(lines.slice(1), [
        '1 finding(s) (critical: 1); 3 of 3 step(s) completed',
        '',
        `[CRITICAL] ${file}:2 Shell command executed with os.system (SEC002)`,
        '    os.system(cmd)',
        '',
        'Fixes: 1 (verified 1, unverified 0)',
        '  verified   os.system(cmd)  ->  subprocess.run(shlex.split(cmd), check=True)',
        '',
      ]);
      assert.ok(err.join('').startsWith('[coordinator#1] review_started: '));
    });

    test('--json writes every event as one NDJSON line', async () => {
      const file = writeSource('clean.py', 'x = 1\n');

      const code = await runReviewCommand(file, { json: true }, { io, container: testContainer() });

      assert.strictEqual(code, EXIT_CODES.completed);
      const lines = out.join('').trimEnd().split('\n');
      const types = lines.map(line => {
        const parsed: unknown = JSON.parse(line);
        assert.ok(typeof parsed === 'object' && parsed !== null && 'event_type' in parsed);
        return parsed.event_type;
      });
      assert.strictEqual(types[0], 'review_started');
      assert.strictEqual(types[types.length - 2], 'final_report');
      assert.strictEqual(types[types.length - 1], 'review_completed');
      assert.deepStrictEqual(err, []);
    });

    test('an unreadable file is a usage error', async () => {
      const code = await runReviewCommand(path.join(tmpDir, 'missing.py'), {}, { io, container: testContainer() });

      assert.strictEqual(code, EXIT_CODES.usage);
      assert.ok(err.join('').startsWith(`Error: cannot read ${path.join(tmpDir, 'missing.py')}: `));
    });

    test('invalid input is a usage error', async () => {
      const file = writeSource('main.js', 'eval(x)\n');

      const code = await runReviewCommand(file, {}, { io, container: testContainer() });

      assert.strictEqual(code, EXIT_CODES.usage);
      assert.deepStrictEqual(err, [
        "Error: Invalid review input:\n- filename: unsupported extension '.js' (supported: .py)\n",
      ]);
    });
  });

  suite('main', () => {
    test('--version exits 0', async () => {
      assert.strictEqual(await main(['node', 'cli', '--version'], io), 0);
      assert.deepStrictEqual(out, ['0.1.0\n']);
    });

    test('an unknown command is a usage error', async () => {
      assert.strictEqual(await main(['node', 'cli', 'bogus'], io), EXIT_CODES.usage);
    });

    test('an unknown analyzer is a usage error', async () => {
      const file = writeSource('sample.py', 'x = 1\n');

      const code = await main(['node', 'cli', 'review', file, '--only', 'nope'], io);

      assert.strictEqual(code, EXIT_CODES.usage);
      assert.ok(err.join('').includes("No analyzer registered as 'nope'"));
    });
  });
});
