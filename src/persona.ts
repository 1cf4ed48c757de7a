/**
 * Persona files: markdown documents whose "## System Prompt" section holds an
 * advisor's system prompt.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import { PersonaError, errorMessage } from './errors.js';
import type { SystemPromptLoader } from './types.js';

const SECTION_HEADING = /^##\s+System Prompt\s*$/i;

/**
 * Body of the "## System Prompt" section, up to the next level-2 heading, with
 * a wrapping fenced block removed. Without that section, the whole document.
 */
export function extractSystemPrompt(markdown: string): string {
  const lines = markdown.replace(/\r\n?/g, '\n').split('\n');
  const start = lines.findIndex((l) => SECTION_HEADING.test(l.trim()));
  if (start === -1) return markdown.trim();

  const body: string[] = [];
  for (const line of lines.slice(start + 1)) {
    if (/^##\s/.test(line)) break;
    body.push(line);
  }

  let text = body.join('\n').trim();
  const fenced = /^```[\w-]*\n([\s\S]*?)\n?```$/.exec(text);
  if (fenced) text = fenced[1].trim();
  return text;
}

/**
 * Build a loader over persona directories, searched in order.
 */
export function createPromptLoader(searchDirs: string[]): SystemPromptLoader {
  return async (ref: string) => {
    const candidates = isAbsolute(ref) ? [ref] : searchDirs.map((d) => join(d, ref));
    const path = candidates.find((p) => existsSync(p));
    if (!path) {
      throw new PersonaError(`Persona not found: ${ref} (searched ${candidates.join(', ')})`, ref);
    }
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      throw new PersonaError(`Cannot read persona ${path}: ${errorMessage(err)}`, ref);
    }
    return extractSystemPrompt(raw);
  };
}

// --- Persona authoring ---

export function personaSlug(name: string): string {
  return name
    .toLowerCase()
    .replace(/\s+/g, '_')
    .replace(/[^a-z0-9_]/g, '');
}

export function renderBasicPersona(name: string, description?: string): string {
  const desc = description?.trim();
  return `# ${name}\n\n## System Prompt\n\nYou are ${name}.${desc ? ` ${desc}` : ''}\n`;
}

/** Write `<slug>.md` under personasDir; returns the file name (the prompt ref). */
export async function writePersona(
  personasDir: string,
  name: string,
  markdown: string,
): Promise<string> {
  const slug = personaSlug(name);
  if (!slug) {
    throw new PersonaError(`Cannot derive a file name from advisor name "${name}"`, name);
  }
  const file = `${slug}.md`;
  await mkdir(personasDir, { recursive: true });
  await writeFile(join(personasDir, file), markdown, 'utf-8');
  return file;
}
