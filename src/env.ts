import fs from 'fs/promises';
import path from 'path';
import { errnoCode } from './errors.js';

const ASSIGNMENT = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_.]*)\s*=\s*(.*)$/;

function unquote(value: string): string {
  const quote = value[0];
  if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
    return value.slice(1, -1);
  }
  return value;
}

/** `KEY=value`, optionally prefixed by `export`; blank lines, comments and anything else yield null. */
export function parseDotEnvLine(line: string): [key: string, value: string] | null {
  const match = ASSIGNMENT.exec(line.trim());
  if (!match) {
    return null;
  }
  return [match[1], unquote(match[2].trim())];
}

export function parseDotEnv(content: string): Record<string, string> {
  const entries = content
    .split(/\r?\n/)
    .map(parseDotEnvLine)
    .filter((entry): entry is [string, string] => entry !== null);
  return Object.fromEntries(entries);
}

/**
 * Copies `.env` entries into `env` without overriding variables that are
 * already set. Returns the keys that were applied.
 */
export async function loadDotEnv(
  envPath: string = path.join(process.cwd(), '.env'),
  env: NodeJS.ProcessEnv = process.env
): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(envPath, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
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
