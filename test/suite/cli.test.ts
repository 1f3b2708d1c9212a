import * as assert from 'assert';
import { readFile } from 'fs/promises';
import { join } from 'path';

import { runCli } from '../../src/cli';
import type { CommandIO } from '../../src/commands/io';
import type { FetchFn } from '../../src/utils/http';
import { jsonResponse, silentLogger, withTempDir } from '../helpers';

interface RecordingIO extends CommandIO {
  stdout: string[];
  stderr: string[];
}

function recordingIO(stdin = ''): RecordingIO {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (text) => stdout.push(text),
    err: (text) => stderr.push(text),
    readStdin: async () => stdin,
  };
}

const unofficialFetch: FetchFn = async () => jsonResponse([[['こんにちは', 'Hello', null, null, 1]], null, 'en']);

suite('cli', () => {
  test('prints usage without a command', async () => {
    const io = recordingIO();

    const code = await runCli([], { io, logger: silentLogger });

    assert.strictEqual(code, 1);
    assert.ok(io.stdout[0].startsWith('Usage: roundtrip <command> [options]'));
  });

  test('translate prints the result and persists it to memory', async () => {
    await withTempDir(async (dir) => {
      const io = recordingIO();

      const code = await runCli(['translate', '--text', 'Hello'], {
        env: { TF_APP_HOME: dir },
        io,
        logger: silentLogger,
        overrides: { local: { modelDir: join(dir, 'models') } },
        dependencies: { fetch: unofficialFetch },
      });

      assert.strictEqual(code, 0);
      assert.deepStrictEqual(io.stdout, ['こんにちは']);
      const persisted: unknown = JSON.parse(await readFile(join(dir, 'tm_cache.json'), 'utf8'));
      assert.ok(typeof persisted === 'object' && persisted !== null && 'entries' in persisted);
      assert.deepStrictEqual(
        Array.isArray(persisted.entries) ? persisted.entries.map((entry: { source: string }) => entry.source) : [],
        ['Hello'],
      );
    });
  });

  test('translate reads stdin when no text is given', async () => {
    await withTempDir(async (dir) => {
      const io = recordingIO('Hello\n');

      const code = await runCli(['translate'], {
        env: { TF_APP_HOME: dir },
        io,
        logger: silentLogger,
        overrides: { local: { modelDir: join(dir, 'models') } },
        dependencies: { fetch: unofficialFetch },
      });

      assert.strictEqual(code, 0);
      assert.deepStrictEqual(io.stdout, ['こんにちは']);
    });
  });

  test('translate without any input prints its usage', async () => {
    await withTempDir(async (dir) => {
      const io = recordingIO('');

      const code = await runCli(['translate'], {
        env: { TF_APP_HOME: dir },
        io,
        logger: silentLogger,
        overrides: { local: { modelDir: join(dir, 'models') } },
        dependencies: { fetch: unofficialFetch },
      });

      assert.strictEqual(code, 2);
      assert.deepStrictEqual(io.stderr, ['Usage: roundtrip translate --source <lang> --target <lang> [--text TEXT]']);
      assert.deepStrictEqual(io.stdout, []);
    });
  });

  test('memory stats reports an empty memory', async () => {
    await withTempDir(async (dir) => {
      const io = recordingIO();

      const code = await runCli(['memory', 'stats'], {
        env: { TF_APP_HOME: dir },
        io,
        logger: silentLogger,
        overrides: { local: { modelDir: join(dir, 'models') } },
      });

      assert.strictEqual(code, 0);
      assert.deepStrictEqual(JSON.parse(io.stdout[0]), {
        hits: 0,
        misses: 0,
        fuzzyHits: 0,
        totalLookups: 0,
        totalLookupTimeMs: 0,
        hitRate: 0,
        averageLookupMs: 0,
        size: 0,
        maxEntries: 1000,
      });
    });
  });

  test('models needs the local provider', async () => {
    await withTempDir(async (dir) => {
      const io = recordingIO();

      const code = await runCli(['models', 'status'], {
        env: { TF_APP_HOME: dir },
        io,
        logger: silentLogger,
        overrides: { local: { modelDir: join(dir, 'models') } },
      });

      assert.strictEqual(code, 2);
      assert.deepStrictEqual(io.stderr, ['Model management needs the local provider (set TF_PROVIDER=local).']);
    });
  });

  test('configuration problems exit with code 2', async () => {
    const io = recordingIO();

    const code = await runCli(['translate', 'Hello'], {
      env: { TF_LOCAL_URL: 'not a url' },
      io,
      logger: silentLogger,
    });

    assert.strictEqual(code, 2);
    assert.deepStrictEqual(io.stderr, ['The configuration is invalid: Invalid local.baseUrl: Invalid url']);
  });

  test('unknown commands are rejected', async () => {
    await withTempDir(async (dir) => {
      const io = recordingIO();

      const code = await runCli(['dance'], {
        env: { TF_APP_HOME: dir },
        io,
        logger: silentLogger,
        overrides: { local: { modelDir: join(dir, 'models') } },
      });

      assert.strictEqual(code, 2);
      assert.ok(io.stderr[0].startsWith('Unknown command: dance'));
    });
  });
});
