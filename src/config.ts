import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { parse, stringify } from 'yaml';
import { CouncilConfigSchema, type CouncilConfigFile, type CouncilConfigInput } from './config-schema.js';
import { ConfigError } from './errors.js';
import type { AdvisorSpec, CouncilSettings } from './types.js';

export const CONFIG_DIR = join(homedir(), '.advisor-council');
export const CONFIG_PATH = join(CONFIG_DIR, 'config.yaml');
export const LOCAL_CONFIG_NAME = 'council.yaml';

/** Persona files shipped with the package (used by the default roster). */
export const BUILTIN_PERSONAS_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', 'prompts');

export const DEFAULT_CONFIG: CouncilConfigInput = {
  gateway: { provider: 'ollama', baseUrl: 'http://localhost:11434', timeout: 300 },
  advisors: [
    { id: 'strategist', name: 'Strategist', model: 'gemma3:latest', prompt: 'strategist.md', description: 'Long-range planning and trade-offs.' },
    { id: 'skeptic', name: 'Skeptic', model: 'gpt-oss:latest', prompt: 'skeptic.md', description: 'Hunts for weak assumptions and failure modes.' },
    { id: 'researcher', name: 'Researcher', model: 'deepseek-r1:latest', prompt: 'researcher.md', description: 'Evidence, prior work and precise definitions.' },
    { id: 'analyst', name: 'Analyst', model: 'llama3.2:latest', prompt: 'analyst.md', description: 'Numbers, base rates and decision framing.' },
    { id: 'engineer', name: 'Engineer', model: 'mistral:latest', prompt: 'engineer.md', description: 'Practical implementation and first principles.' },
  ],
  chairmanModel: 'mistral:latest',
};

/**
 * Config path in effect: ./council.yaml when present, else the global file.
 */
export function resolveConfigPath(cwd = process.cwd()): string {
  const local = join(cwd, LOCAL_CONFIG_NAME);
  return existsSync(local) ? local : CONFIG_PATH;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Validate raw (parsed YAML) config and turn it into settings. Relative
 * directories resolve against the directory holding the config file.
 */
export function toSettings(raw: unknown, baseDir: string): CouncilSettings {
  const result = CouncilConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Invalid council config:\n${issues}`);
  }
  const cfg = result.data;
  const dir = (p: string | undefined, fallback: string) =>
    p === undefined ? fallback : isAbsolute(p) ? p : resolve(baseDir, p);

  const settings: CouncilSettings = {
    gateway: { ...cfg.gateway },
    advisors: cfg.advisors.map((a) => ({ ...a })),
    chairmanModel: cfg.chairmanModel,
    ...(cfg.titleModel ? { titleModel: cfg.titleModel } : {}),
    personasDir: dir(cfg.personasDir, join(CONFIG_DIR, 'prompts')),
    dataDir: dir(cfg.dataDir, CONFIG_DIR),
  };
  return deepFreeze(settings);
}

/**
 * Load settings from `path` (default: resolveConfigPath()). A missing file
 * yields the built-in roster.
 */
export async function loadConfig(path = resolveConfigPath()): Promise<CouncilSettings> {
  if (!existsSync(path)) return toSettings(DEFAULT_CONFIG, dirname(path));

  const raw = await readFile(path, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    throw new ConfigError(`${path}: ${err instanceof Error ? err.message : String(err)}`, path);
  }
  return toSettings(parsed, dirname(path));
}

async function readRaw(path: string): Promise<CouncilConfigInput> {
  if (!existsSync(path)) return structuredClone(DEFAULT_CONFIG);
  let parsed: unknown;
  try {
    parsed = parse(await readFile(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`${path}: ${err instanceof Error ? err.message : String(err)}`, path);
  }
  const result = CouncilConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid council config at ${path}; fix it before editing`, path);
  }
  return result.data;
}

export async function saveConfig(config: CouncilConfigFile | CouncilConfigInput, path = resolveConfigPath()): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, stringify(config), { encoding: 'utf-8', mode: 0o600 });
}

// --- Roster edits (load → modify → save) ---

export async function addAdvisor(advisor: AdvisorSpec, path = resolveConfigPath()): Promise<CouncilSettings> {
  const config = await readRaw(path);
  const advisors = (config.advisors ?? []).filter((a) => a.id !== advisor.id);
  advisors.push({ ...advisor });
  const next = { ...config, advisors };
  const settings = toSettings(next, dirname(path));
  await saveConfig(next, path);
  return settings;
}

export async function removeAdvisor(idOrName: string, path = resolveConfigPath()): Promise<CouncilSettings> {
  const config = await readRaw(path);
  const before = config.advisors ?? [];
  const advisors = before.filter((a) => a.id !== idOrName && a.name !== idOrName);
  if (advisors.length === before.length) {
    throw new ConfigError(`No advisor named "${idOrName}"`, path);
  }
  const next = { ...config, advisors };
  await saveConfig(next, path);
  return toSettings(next, dirname(path));
}

export async function setChairman(model: string, path = resolveConfigPath()): Promise<CouncilSettings> {
  const config = await readRaw(path);
  const next = { ...config, chairmanModel: model };
  const settings = toSettings(next, dirname(path));
  await saveConfig(next, path);
  return settings;
}
