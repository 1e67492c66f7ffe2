import { readFileSync, existsSync } from 'node:fs';
import path from 'node:path';

/**
 * Parse dotenv-style text into key/value pairs.
 *
 * - KEY=VALUE lines, optional leading `export `
 * - Comments and empty lines are skipped
 * - Surrounding single or double quotes are stripped
 */
export function parseEnvText(raw: string): Record<string, string> {
  const out: Record<string, string> = {};

  for (const line of raw.split(/\r?\n/)) {
    let trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    if (trimmed.startsWith('export ')) trimmed = trimmed.slice('export '.length).trim();

    const eq = trimmed.indexOf('=');
    if (eq === -1) continue;
    const key = trimmed.slice(0, eq).trim();
    let value = trimmed.slice(eq + 1).trim();

    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    if (key) out[key] = value;
  }

  return out;
}

/**
 * Minimal .env loader (no external deps). Keys already present in `target`
 * are never overridden, so the real environment wins over files.
 */
export function loadEnvFiles(
  filenames: string[] = ['.env', '.env.local'],
  cwd: string = process.cwd(),
  target: NodeJS.ProcessEnv = process.env,
): { loaded: string[] } {
  const loaded: string[] = [];

  for (const name of filenames) {
    const filePath = path.join(cwd, name);
    if (!existsSync(filePath)) continue;

    const pairs = parseEnvText(readFileSync(filePath, 'utf8'));
    for (const [key, value] of Object.entries(pairs)) {
      if (target[key] === undefined) target[key] = value;
    }

    loaded.push(name);
  }

  return { loaded };
}
