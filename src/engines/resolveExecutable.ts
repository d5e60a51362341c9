import { promises as fs, constants as fsConstants } from 'fs';
import path from 'path';

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const stats = await fs.stat(candidate);
    if (!stats.isFile()) {
      return false;
    }
    if (process.platform === 'win32') {
      return true;
    }
    await fs.access(candidate, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function looksLikePath(value: string): boolean {
  return path.isAbsolute(value) || value.includes('/') || value.includes(path.sep);
}

function windowsExtensions(env: NodeJS.ProcessEnv): string[] {
  if (process.platform !== 'win32') {
    return [''];
  }
  const pathExt = env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM';
  return ['', ...pathExt.split(';').filter(Boolean)];
}

/**
 * Resolve what the user typed into an engine executable.
 *
 * An existing file path (absolute or relative to the working directory) must be
 * executable and is returned absolute. A bare command name is searched for on
 * PATH. Anything else resolves to null, before any process is launched.
 */
export async function resolveExecutable(
  value: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string | null> {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  const absolute = path.resolve(trimmed);
  if (looksLikePath(trimmed) || (await fileExists(absolute))) {
    return (await isExecutableFile(absolute)) ? absolute : null;
  }

  const searchPath = env.PATH ?? env.Path ?? '';
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    for (const ext of windowsExtensions(env)) {
      const candidate = path.join(dir, trimmed + ext);
      if (await isExecutableFile(candidate)) {
        return candidate;
      }
    }
  }

  return null;
}

async function fileExists(candidate: string): Promise<boolean> {
  try {
    await fs.stat(candidate);
    return true;
  } catch {
    return false;
  }
}
