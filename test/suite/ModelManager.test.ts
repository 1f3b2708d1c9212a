import * as assert from 'assert';
import { createHash } from 'crypto';
import { mkdir, readFile, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import JSZip from 'jszip';
import { pathToFileURL } from 'url';

import { ModelManager } from '../../src/local/ModelManager';
import type { FetchFn } from '../../src/utils/http';
import { silentLogger, withTempDir } from '../helpers';

function modelArchive(label: string, layout: 'single' | 'split' = 'single'): Promise<Buffer> {
  const zip = new JSZip();
  zip.file('ct2/model.bin', `weights ${label}`);
  if (layout === 'single') {
    zip.file('spm.model', `spm ${label}`);
  } else {
    zip.file('source.spm', `source ${label}`);
    zip.file('target.spm', `target ${label}`);
  }
  return zip.generateAsync({ type: 'nodebuffer' });
}

/** A well-formed archive whose deflated model bytes are overwritten with garbage. */
async function archiveWithCorruptEntry(): Promise<Buffer> {
  const zip = new JSZip();
  zip.file('ct2/model.bin', 'weights ja-en '.repeat(200));
  zip.file('spm.model', 'spm ja-en');
  const content = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });

  const name = Buffer.from('ct2/model.bin');
  const header = content.indexOf(name) - 30;
  const compressedSize = content.readUInt32LE(header + 18);
  const dataStart = header + 30 + name.length + content.readUInt16LE(header + 28);
  content.fill(0xff, dataStart, dataStart + compressedSize);
  return content;
}

async function writeArchive(dir: string, name: string, content: Buffer): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, content);
  return pathToFileURL(path).href;
}

function sha256(content: Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

suite('ModelManager', () => {
  test('reports missing directories before anything is installed', async () => {
    await withTempDir(async (dir) => {
      const manager = new ModelManager(join(dir, 'models'), silentLogger);

      const status = await manager.status();
      const verified = await manager.verify();

      assert.deepStrictEqual(status, {
        model_dir: join(dir, 'models'),
        en_ja: { installed: false, reason: 'missing directory' },
        ja_en: { installed: false, reason: 'missing directory' },
      });
      assert.strictEqual(verified.ok, false);
    });
  });

  test('explains what a partial direction is missing', async () => {
    await withTempDir(async (dir) => {
      const modelDir = join(dir, 'models');
      await mkdir(join(modelDir, 'en-ja'), { recursive: true });
      await mkdir(join(modelDir, 'ja-en', 'ct2'), { recursive: true });
      const manager = new ModelManager(modelDir, silentLogger);

      assert.deepStrictEqual(await manager.verifyDirection({ source: 'en', target: 'ja' }), {
        installed: false,
        reason: 'missing ct2/',
      });
      assert.deepStrictEqual(await manager.verifyDirection({ source: 'ja', target: 'en' }), {
        installed: false,
        reason: 'missing SentencePiece model (spm.model or source.spm+target.spm)',
      });
    });
  });

  test('installs both directions from local archives', async () => {
    await withTempDir(async (dir) => {
      const modelDir = join(dir, 'models');
      const enJa = await modelArchive('en-ja');
      const jaEn = await modelArchive('ja-en', 'split');
      const manager = new ModelManager(modelDir, silentLogger);

      const result = await manager.install({
        enJaUrl: await writeArchive(dir, 'a.zip', enJa),
        jaEnUrl: await writeArchive(dir, 'b.zip', jaEn),
        enJaSha256: sha256(enJa).toUpperCase(),
        jaEnSha256: sha256(jaEn),
      });

      assert.deepStrictEqual(result.getOrNull(), {
        ok: true,
        model_dir: modelDir,
        en_ja: { installed: true, reason: 'ok' },
        ja_en: { installed: true, reason: 'ok' },
      });
      assert.strictEqual(await readFile(join(modelDir, 'en-ja', 'ct2', 'model.bin'), 'utf8'), 'weights en-ja');
      assert.strictEqual(await readFile(join(modelDir, 'ja-en', 'target.spm'), 'utf8'), 'target ja-en');
    });
  });

  test('downloads http archives through the injected fetch', async () => {
    await withTempDir(async (dir) => {
      const archives: Record<string, Buffer> = {
        'https://models.test/en-ja.zip': await modelArchive('en-ja'),
        'https://models.test/ja-en.zip': await modelArchive('ja-en'),
      };
      const requested: string[] = [];
      const fetchStub: FetchFn = async (input) => {
        const url = input.toString();
        requested.push(url);
        const body = archives[url];
        return body ? new Response(body) : new Response('missing', { status: 404 });
      };
      const manager = new ModelManager(join(dir, 'models'), silentLogger, { fetch: fetchStub });

      const result = await manager.install({
        enJaUrl: 'https://models.test/en-ja.zip',
        jaEnUrl: 'https://models.test/ja-en.zip',
      });

      assert.strictEqual(result.getOrNull()?.ok, true);
      assert.deepStrictEqual(requested, ['https://models.test/en-ja.zip', 'https://models.test/ja-en.zip']);
    });
  });

  test('a failed download is a network error', async () => {
    await withTempDir(async (dir) => {
      const fetchStub: FetchFn = async () => new Response('gone', { status: 404 });
      const manager = new ModelManager(join(dir, 'models'), silentLogger, { fetch: fetchStub });

      const result = await manager.install({
        enJaUrl: 'https://models.test/en-ja.zip',
        jaEnUrl: 'https://models.test/ja-en.zip',
      });

      assert.ok(result.isFailure());
      assert.strictEqual(result.error.code, 'network');
      assert.strictEqual(result.error.message, 'Failed to download model: HTTP 404');
    });
  });

  test('a checksum mismatch leaves the model directory untouched', async () => {
    await withTempDir(async (dir) => {
      const modelDir = join(dir, 'models');
      const manager = new ModelManager(modelDir, silentLogger);

      const result = await manager.install({
        enJaUrl: await writeArchive(dir, 'a.zip', await modelArchive('en-ja')),
        jaEnUrl: await writeArchive(dir, 'b.zip', await modelArchive('ja-en')),
        jaEnSha256: '0'.repeat(64),
      });

      assert.ok(result.isFailure());
      assert.strictEqual(result.error.code, 'checksumMismatch');
      assert.strictEqual(result.error.message, 'ja-en checksum mismatch');
      assert.strictEqual(await exists(modelDir), false);
    });
  });

  test('a corrupt archive is rejected before extraction', async () => {
    await withTempDir(async (dir) => {
      const modelDir = join(dir, 'models');
      const manager = new ModelManager(modelDir, silentLogger);

      const result = await manager.install({
        enJaUrl: await writeArchive(dir, 'a.zip', await modelArchive('en-ja')),
        jaEnUrl: await writeArchive(dir, 'b.zip', Buffer.from('definitely not a zip file')),
      });

      assert.ok(result.isFailure());
      assert.strictEqual(result.error.code, 'invalidResponse');
      assert.strictEqual(result.error.message, 'Invalid zip archive: ja-en.zip');
      assert.strictEqual(await exists(modelDir), false);
    });
  });

  test('an entry that fails to decompress leaves the model directory untouched', async () => {
    await withTempDir(async (dir) => {
      const modelDir = join(dir, 'models');
      const manager = new ModelManager(modelDir, silentLogger);

      const result = await manager.install({
        enJaUrl: await writeArchive(dir, 'a.zip', await modelArchive('en-ja')),
        jaEnUrl: await writeArchive(dir, 'b.zip', await archiveWithCorruptEntry()),
      });

      assert.ok(result.isFailure());
      assert.strictEqual(result.error.code, 'invalidResponse');
      assert.strictEqual(result.error.message, 'Invalid zip archive: ja-en.zip');
      assert.strictEqual(await exists(modelDir), false);
    });
  });

  test('requires both urls when no preset is named', async () => {
    await withTempDir(async (dir) => {
      const manager = new ModelManager(join(dir, 'models'), silentLogger);

      const result = await manager.install({ enJaUrl: 'https://models.test/en-ja.zip' });

      assert.ok(result.isFailure());
      assert.strictEqual(result.error.code, 'userError');
      assert.strictEqual(result.error.message, 'Provide en_ja_url and ja_en_url, or preset');
    });
  });

  test('rejects unsupported url schemes', async () => {
    await withTempDir(async (dir) => {
      const manager = new ModelManager(join(dir, 'models'), silentLogger);

      const result = await manager.install({ enJaUrl: 'ftp://models.test/a.zip', jaEnUrl: 'ftp://models.test/b.zip' });

      assert.ok(result.isFailure());
      assert.strictEqual(result.error.message, 'Unsupported model URL scheme: ftp:');
    });
  });

  test('installs the bundled preset from the pack directory', async () => {
    await withTempDir(async (dir) => {
      const presetDir = join(dir, 'packs');
      await mkdir(presetDir);
      await writeFile(join(presetDir, 'elanmt-tiny-int8-en-ja.zip'), await modelArchive('en-ja'));
      await writeFile(join(presetDir, 'elanmt-tiny-int8-ja-en.zip'), await modelArchive('ja-en'));
      const manager = new ModelManager(join(dir, 'models'), silentLogger, { presetDir });

      const result = await manager.install({ preset: 'default' });

      assert.strictEqual(result.getOrNull()?.ok, true);
    });
  });

  test('preset failures name the problem', async () => {
    await withTempDir(async (dir) => {
      const presetDir = join(dir, 'packs');
      const manager = new ModelManager(join(dir, 'models'), silentLogger, { presetDir });

      const unknown = await manager.install({ preset: 'huge-model' });
      const missing = await manager.install({ preset: 'elanmt-tiny-int8' });

      assert.ok(unknown.isFailure());
      assert.strictEqual(unknown.error.message, 'Unknown preset: huge-model');
      assert.ok(missing.isFailure());
      assert.strictEqual(missing.error.code, 'modelUnavailable');
      assert.strictEqual(missing.error.message, `Default model pack not found under ${presetDir}.`);
    });
  });

  test('remove deletes the model root', async () => {
    await withTempDir(async (dir) => {
      const modelDir = join(dir, 'models');
      await mkdir(join(modelDir, 'en-ja', 'ct2'), { recursive: true });
      const manager = new ModelManager(modelDir, silentLogger);

      const removed = await manager.remove();

      assert.deepStrictEqual(removed, { ok: true, model_dir: modelDir });
      assert.strictEqual(await exists(modelDir), false);
    });
  });
});
