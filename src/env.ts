import fs from 'fs/promises';
import path from 'path';

export function parseDotEnv(content: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    let trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    if (trimmed.startsWith('export ')) {
      trimmed = trimmed.slice('export '.length).trim();
    }
    const idx = trimmed.indexOf('=');
    if (idx <= 0) {
      continue;
    }
    const key = trimmed.slice(0, idx).trim();
    let value = trimmed.slice(idx + 1).trim();
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    } else {
      value = value.replace(/\s+#.*$/, '');
    }
    values[key] = value;
  }
  return values;
}

/**
 * Copies `.env` entries into the environment without overriding variables
 * that are already set. Returns the keys that were applied.
 */
export async function loadDotEnv(
  envPath: string = path.join(process.cwd(), '.env'),
  env: NodeJS.ProcessEnv = process.env
): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(envPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const applied: string[] = [];
  for (const [key, value] of Object.entries(parseDotEnv(content))) {
    if (!env[key]) {
      env[key] = value;
      applied.push(key);
    }
  }
  return applied;
}
