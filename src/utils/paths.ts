import { homedir } from 'os';
import { join, resolve } from 'path';

export function resolveDataRoot(env: NodeJS.ProcessEnv, fallbackRoot: string): string {
  const override = env.TF_APP_HOME?.trim();
  return override ? resolve(expandHome(override)) : join(fallbackRoot, 'data');
}

export function memoryFilePath(dataRoot: string): string {
  return join(dataRoot, 'tm_cache.json');
}

export function defaultModelDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): string {
  if (platform === 'win32') {
    const base = env.LOCALAPPDATA ?? join(home, 'AppData', 'Local');
    return join(base, 'TranslationFiesta', 'models');
  }
  if (platform === 'darwin') {
    return join(home, 'Library', 'Application Support', 'TranslationFiesta', 'models');
  }
  return join(home, '.cache', 'translationfiesta', 'models');
}

export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') {
    return home;
  }
  return path.startsWith('~/') ? join(home, path.slice(2)) : path;
}
