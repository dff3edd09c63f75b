import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

// src/prompts in development, dist/src/prompts after `npm run build`
const PROMPTS_DIR = fileURLToPath(new URL('../prompts/', import.meta.url));

export async function loadPrompt(name: string): Promise<string> {
  return readFile(join(PROMPTS_DIR, name), 'utf8');
}

/** Fill `{{name}}` placeholders. Unknown placeholders are left as they are. */
export function renderPrompt(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => values[key] ?? match);
}
