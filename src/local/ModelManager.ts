import { copyFile, mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import JSZip from 'jszip';
import { tmpdir } from 'os';
import { dirname, join, resolve, sep } from 'path';
import { fileURLToPath, pathToFileURL } from 'url';

import type { DirectionStatus, ModelsRemoveResult, ModelsStatus, ModelsVerifyResult } from '../messaging/channel';
import { TranslationError } from '../services/TranslationError';
import type { LanguagePair } from '../types/translation';
import { digestsMatch, sha256File } from '../utils/hash';
import type { FetchFn } from '../utils/http';
import { ServiceLogger } from '../utils/logger';
import { failure, success, type Result } from '../utils/result';
import { directionName, SUPPORTED_DIRECTIONS } from './directions';

export const DEFAULT_PRESET = 'elanmt-tiny-int8';

const PRESET_ALIASES = new Set(['default', 'elanmt-tiny-int8', 'elanmt_tiny_int8']);
const PRESET_FILES = {
  enJa: 'elanmt-tiny-int8-en-ja.zip',
  jaEn: 'elanmt-tiny-int8-ja-en.zip',
};

export interface ModelInstallSpec {
  preset?: string | null;
  enJaUrl?: string;
  jaEnUrl?: string;
  enJaSha256?: string | null;
  jaEnSha256?: string | null;
}

export interface ModelManagerOptions {
  presetDir?: string;
  fetch?: FetchFn;
}

/** A decompressed archive entry; no content means a directory. */
interface ArchiveEntry {
  target: string;
  content?: Buffer;
}

interface ArchiveSource {
  pair: LanguagePair;
  url: string;
  sha256?: string | null;
}

/**
 * Owns the model root: one `{source}-{target}` directory per direction, each
 * holding `ct2/` and either `spm.model` or `source.spm` + `target.spm`.
 */
export class ModelManager {
  readonly presetDir: string;
  private readonly fetchFn: FetchFn;

  constructor(
    readonly modelDir: string,
    private readonly logger: ServiceLogger,
    options: ModelManagerOptions = {},
  ) {
    this.presetDir = options.presetDir ?? join(__dirname, 'model_packs');
    this.fetchFn = options.fetch ?? fetch;
  }

  async status(): Promise<ModelsStatus> {
    const [enJa, jaEn] = await Promise.all(SUPPORTED_DIRECTIONS.map((pair) => this.verifyDirection(pair)));
    return { model_dir: this.modelDir, en_ja: enJa, ja_en: jaEn };
  }

  async verifyDirection(pair: LanguagePair): Promise<DirectionStatus> {
    const directionDir = join(this.modelDir, directionName(pair));
    if (!(await exists(directionDir))) {
      return { installed: false, reason: 'missing directory' };
    }
    if (!(await exists(join(directionDir, 'ct2')))) {
      return { installed: false, reason: 'missing ct2/' };
    }
    if (await exists(join(directionDir, 'spm.model'))) {
      return { installed: true, reason: 'ok' };
    }
    if ((await exists(join(directionDir, 'source.spm'))) && (await exists(join(directionDir, 'target.spm')))) {
      return { installed: true, reason: 'ok' };
    }
    return { installed: false, reason: 'missing SentencePiece model (spm.model or source.spm+target.spm)' };
  }

  async verify(): Promise<ModelsVerifyResult> {
    const status = await this.status();
    return { ok: status.en_ja.installed && status.ja_en.installed, ...status };
  }

  async remove(): Promise<ModelsRemoveResult> {
    await rm(this.modelDir, { recursive: true, force: true });
    this.logger.info(`Removed model directory ${this.modelDir}.`);
    return { ok: true, model_dir: this.modelDir };
  }

  async install(spec: ModelInstallSpec): Promise<Result<ModelsVerifyResult, TranslationError>> {
    if (spec.preset) {
      return this.installPreset(spec.preset);
    }
    if (!spec.enJaUrl || !spec.jaEnUrl) {
      return failure<TranslationError, ModelsVerifyResult>(
        TranslationError.userError('Provide en_ja_url and ja_en_url, or preset'),
      );
    }

    return this.installArchives([
      { pair: { source: 'en', target: 'ja' }, url: spec.enJaUrl, sha256: spec.enJaSha256 },
      { pair: { source: 'ja', target: 'en' }, url: spec.jaEnUrl, sha256: spec.jaEnSha256 },
    ]);
  }

  private async installPreset(preset: string): Promise<Result<ModelsVerifyResult, TranslationError>> {
    if (!PRESET_ALIASES.has(preset.trim().toLowerCase())) {
      return failure<TranslationError, ModelsVerifyResult>(TranslationError.userError(`Unknown preset: ${preset}`));
    }

    const enJa = join(this.presetDir, PRESET_FILES.enJa);
    const jaEn = join(this.presetDir, PRESET_FILES.jaEn);
    if (!(await exists(enJa)) || !(await exists(jaEn))) {
      return failure<TranslationError, ModelsVerifyResult>(
        TranslationError.modelUnavailable(`Default model pack not found under ${this.presetDir}.`),
      );
    }

    return this.install({ enJaUrl: pathToFileURL(enJa).href, jaEnUrl: pathToFileURL(jaEn).href });
  }

  private async installArchives(sources: ArchiveSource[]): Promise<Result<ModelsVerifyResult, TranslationError>> {
    const tempDir = await mkdtemp(join(tmpdir(), 'tf_local_models_'));

    try {
      const archives: Array<{ source: ArchiveSource; path: string }> = [];
      for (const source of sources) {
        const path = join(tempDir, `${directionName(source.pair)}.zip`);
        const downloaded = await this.download(source.url, path);
        if (downloaded.isFailure()) {
          return failure<TranslationError, ModelsVerifyResult>(downloaded.error);
        }
        archives.push({ source, path });
      }

      for (const { source, path } of archives) {
        if (source.sha256 && !digestsMatch(await sha256File(path), source.sha256)) {
          this.logger.warn(`Checksum mismatch for ${directionName(source.pair)} archive.`);
          return failure<TranslationError, ModelsVerifyResult>(
            TranslationError.checksumMismatch(directionName(source.pair)),
          );
        }
      }

      const unpacked: ArchiveEntry[][] = [];
      for (const { source, path } of archives) {
        const entries = await unpackArchive(
          await readFile(path),
          join(this.modelDir, directionName(source.pair)),
          `${directionName(source.pair)}.zip`,
        );
        if (entries.isFailure()) {
          return failure<TranslationError, ModelsVerifyResult>(entries.error);
        }
        unpacked.push(entries.value);
      }

      for (const entries of unpacked) {
        await writeEntries(entries);
      }

      this.logger.info(`Installed models into ${this.modelDir}.`);
      return success<ModelsVerifyResult, TranslationError>(await this.verify());
    } finally {
      await rm(tempDir, { recursive: true, force: true });
    }
  }

  private async download(url: string, destination: string): Promise<Result<void, TranslationError>> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return failure<TranslationError, void>(TranslationError.userError(`Invalid model URL: ${url}`));
    }

    try {
      if (parsed.protocol === 'file:') {
        await copyFile(fileURLToPath(parsed), destination);
        return success<void, TranslationError>(undefined);
      }
      if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        return failure<TranslationError, void>(
          TranslationError.userError(`Unsupported model URL scheme: ${parsed.protocol}`),
        );
      }

      const response = await this.fetchFn(parsed);
      if (!response.ok) {
        return failure<TranslationError, void>(
          TranslationError.network(`Failed to download model: HTTP ${response.status}`),
        );
      }
      await writeFile(destination, Buffer.from(await response.arrayBuffer()));
      return success<void, TranslationError>(undefined);
    } catch (error) {
      return failure<TranslationError, void>(
        TranslationError.network(`Failed to download model: ${error instanceof Error ? error.message : String(error)}`),
      );
    }
  }
}

/** Loads and fully decompresses an archive in memory; nothing is written until every entry reads cleanly. */
async function unpackArchive(
  content: Buffer,
  destination: string,
  archiveName: string,
): Promise<Result<ArchiveEntry[], TranslationError>> {
  const invalid = failure<TranslationError, ArchiveEntry[]>(
    TranslationError.invalidResponse(`Invalid zip archive: ${archiveName}`),
  );

  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(content);
  } catch {
    return invalid;
  }

  const escaping = Object.keys(zip.files).find((name) => !isInside(destination, name));
  if (escaping !== undefined) {
    return failure<TranslationError, ArchiveEntry[]>(
      TranslationError.invalidResponse(`Unsafe path in ${archiveName}: ${escaping}`),
    );
  }

  const entries: ArchiveEntry[] = [{ target: resolve(destination) }];
  try {
    for (const entry of Object.values(zip.files)) {
      const target = resolve(destination, entry.name);
      entries.push(entry.dir ? { target } : { target, content: await entry.async('nodebuffer') });
    }
  } catch {
    return invalid;
  }
  return success<ArchiveEntry[], TranslationError>(entries);
}

function isInside(root: string, entryName: string): boolean {
  const base = resolve(root);
  const target = resolve(base, entryName);
  return target === base || target.startsWith(`${base}${sep}`);
}

async function writeEntries(entries: ArchiveEntry[]): Promise<void> {
  for (const entry of entries) {
    if (entry.content === undefined) {
      await mkdir(entry.target, { recursive: true });
      continue;
    }
    await mkdir(dirname(entry.target), { recursive: true });
    await writeFile(entry.target, entry.content);
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}
