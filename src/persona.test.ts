import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PersonaError } from './errors.js';
import {
  createPromptLoader,
  extractSystemPrompt,
  personaSlug,
  renderBasicPersona,
  writePersona,
} from './persona.js';

describe('extractSystemPrompt', () => {
  it('takes the System Prompt section up to the next heading', () => {
    const md = '# Sage\n\nIntro.\n\n## System Prompt\n\nYou are wise.\nBe brief.\n\n## Notes\n\nignored';
    expect(extractSystemPrompt(md)).toBe('You are wise.\nBe brief.');
  });

  it('unwraps a fenced block', () => {
    const md = '## System Prompt\n\n```text\nYou are wise.\n```\n';
    expect(extractSystemPrompt(md)).toBe('You are wise.');
  });

  it('uses the whole document without the section', () => {
    expect(extractSystemPrompt('  You are a plain prompt.\n')).toBe('You are a plain prompt.');
  });
});

describe('createPromptLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'council-persona-'));
    await mkdir(join(dir, 'user'));
    await mkdir(join(dir, 'builtin'));
    await writeFile(join(dir, 'builtin', 'sage.md'), '## System Prompt\n\nbuilt-in sage');
    await writeFile(join(dir, 'builtin', 'critic.md'), '## System Prompt\n\nbuilt-in critic');
    await writeFile(join(dir, 'user', 'sage.md'), '## System Prompt\n\nmy sage');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('searches directories in order', async () => {
    const load = createPromptLoader([join(dir, 'user'), join(dir, 'builtin')]);
    expect(await load('sage.md')).toBe('my sage');
    expect(await load('critic.md')).toBe('built-in critic');
  });

  it('accepts absolute references', async () => {
    const load = createPromptLoader([]);
    expect(await load(join(dir, 'builtin', 'critic.md'))).toBe('built-in critic');
  });

  it('throws PersonaError for a missing file', async () => {
    const load = createPromptLoader([join(dir, 'user')]);
    await expect(load('ghost.md')).rejects.toBeInstanceOf(PersonaError);
  });
});

describe('persona authoring', () => {
  it('derives file slugs from names', () => {
    expect(personaSlug("Devil's Advocate")).toBe('devils_advocate');
    expect(personaSlug('Analyst 2')).toBe('analyst_2');
  });

  it('renders a loadable basic persona', () => {
    const md = renderBasicPersona('Sage', 'Gives measured advice.');
    expect(md).toBe('# Sage\n\n## System Prompt\n\nYou are Sage. Gives measured advice.\n');
    expect(extractSystemPrompt(md)).toBe('You are Sage. Gives measured advice.');
    expect(renderBasicPersona('Sage')).toBe('# Sage\n\n## System Prompt\n\nYou are Sage.\n');
  });

  it('writes the persona under its slug', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'council-persona-'));
    try {
      const file = await writePersona(join(dir, 'nested'), 'Night Owl', 'body');
      expect(file).toBe('night_owl.md');
      expect(await readFile(join(dir, 'nested', file), 'utf-8')).toBe('body');
      await expect(writePersona(dir, '!!!', 'x')).rejects.toBeInstanceOf(PersonaError);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
