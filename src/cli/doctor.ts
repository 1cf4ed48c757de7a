import type { Command } from 'commander';
import pc from 'picocolors';
import { existsSync } from 'node:fs';
import { loadConfig, resolveConfigPath } from '../config.js';
import { errorMessage } from '../errors.js';
import { boundedCall } from '../invoke.js';
import { StatsRecorder, getGatewayStatus, listHostModels } from '../monitoring.js';
import { DEFAULT_OLLAMA_URL, createGateway } from '../providers/base.js';
import type { CouncilSettings } from '../types.js';
import { pad, tildefy } from './helpers.js';

// ── Types ──────────────────────────────────────────────────────────────────

type Status = 'ok' | 'warn' | 'error';

interface CheckResult {
  status: Status;
  label: string;
  detail: string;
}

// ── Symbols ────────────────────────────────────────────────────────────────

function icon(s: Status): string {
  switch (s) {
    case 'ok':
      return pc.green('✅');
    case 'warn':
      return pc.yellow('⚠️');
    case 'error':
      return pc.red('❌');
  }
}

// ── Individual checks ──────────────────────────────────────────────────────

async function checkConfig(path: string): Promise<{ result: CheckResult; settings: CouncilSettings | null }> {
  const label = 'Config';
  try {
    const settings = await loadConfig(path);
    const detail = existsSync(path)
      ? `${tildefy(path)} valid, ${settings.advisors.length} advisor(s)`
      : `${tildefy(path)} not found, using built-in roster`;
    const status: Status = settings.advisors.length === 0 ? 'warn' : existsSync(path) ? 'ok' : 'warn';
    return { result: { status, label, detail }, settings };
  } catch (err) {
    return { result: { status: 'error', label, detail: errorMessage(err) }, settings: null };
  }
}

function checkNodeVersion(): CheckResult {
  const label = 'Node.js';
  const major = parseInt(process.versions.node.split('.')[0], 10);
  const version = `v${process.versions.node}`;
  if (major >= 20) {
    return { status: 'ok', label, detail: `${version} (requires ≥20)` };
  }
  return { status: 'error', label, detail: `${version}: requires ≥20, please upgrade` };
}

async function checkHost(settings: CouncilSettings): Promise<CheckResult[]> {
  const baseUrl = settings.gateway.baseUrl ?? DEFAULT_OLLAMA_URL;
  const status = await getGatewayStatus(baseUrl);
  if (status.service !== 'online') {
    return [
      {
        status: 'error',
        label: 'Ollama',
        detail: `${baseUrl} ${status.service}${status.error ? `: ${status.error}` : ''}`,
      },
    ];
  }

  const loaded = status.runningModels.map((m) => m.name);
  const results: CheckResult[] = [
    {
      status: 'ok',
      label: 'Ollama',
      detail: `${baseUrl} v${status.version ?? '?'}${loaded.length > 0 ? `, loaded: ${loaded.join(', ')}` : ''}`,
    },
  ];

  const installed = new Set(await listHostModels(baseUrl));
  const needed = new Set([...settings.advisors.map((a) => a.model), settings.chairmanModel]);
  const missing = [...needed].filter((m) => !installed.has(m));
  results.push(
    missing.length === 0
      ? { status: 'ok', label: 'Models', detail: `all ${needed.size} installed` }
      : { status: 'warn', label: 'Models', detail: `not installed: ${missing.join(', ')} (ollama pull <model>)` },
  );
  return results;
}

/** One short call to the chairman model, timed. */
async function checkProbe(settings: CouncilSettings): Promise<CheckResult> {
  const label = 'Chairman';
  const stats = new StatsRecorder();
  const outcome = await boundedCall(
    {
      gateway: createGateway(settings.gateway),
      timeoutMs: Math.min(settings.gateway.timeout * 1000, 60_000),
      observer: stats,
      warn: () => {},
    },
    'stage3',
    { name: 'probe', model: settings.chairmanModel },
    [{ role: 'user', content: 'Say "ok".' }],
    'Respond with only the word ok.',
  );
  const latency = stats.snapshot().global.averageLatencyMs;
  if (outcome.ok) {
    return { status: 'ok', label, detail: `${settings.chairmanModel} answered in ${latency}ms` };
  }
  return { status: 'error', label, detail: `${settings.chairmanModel}: ${outcome.error}` };
}

// ── Main ───────────────────────────────────────────────────────────────────

export async function runDoctor(configPath = resolveConfigPath()): Promise<number> {
  const results: CheckResult[] = [];

  const { result: configResult, settings } = await checkConfig(configPath);
  results.push(configResult, checkNodeVersion());

  if (settings) {
    if (settings.gateway.provider === 'ollama') results.push(...(await checkHost(settings)));
    results.push(await checkProbe(settings));
  }

  const maxLabel = Math.max(...results.map((r) => r.label.length));
  console.log('');
  for (const r of results) {
    console.log(`${icon(r.status)} ${pad(r.label, maxLabel + 2)}${r.detail}`);
  }

  const ok = results.filter((r) => r.status === 'ok').length;
  const warns = results.filter((r) => r.status === 'warn').length;
  const errors = results.filter((r) => r.status === 'error').length;

  console.log('');
  const parts: string[] = [];
  if (ok > 0) parts.push(pc.green(`${ok} healthy`));
  if (errors > 0) parts.push(pc.red(`${errors} error${errors > 1 ? 's' : ''}`));
  if (warns > 0) parts.push(pc.yellow(`${warns} warning${warns > 1 ? 's' : ''}`));
  console.log(parts.join(', '));
  console.log('');

  return errors > 0 ? 1 : 0;
}

// ── CLI registration ───────────────────────────────────────────────────────

export function registerDoctorCommand(program: Command): void {
  program
    .command('doctor')
    .description('Check the council setup: config, model host, chairman')
    .action(async () => {
      const exitCode = await runDoctor();
      process.exit(exitCode);
    });

  program
    .command('models')
    .description('List models installed on the Ollama host')
    .action(async () => {
      const settings = await loadConfig();
      const baseUrl = settings.gateway.baseUrl ?? DEFAULT_OLLAMA_URL;
      const models = await listHostModels(baseUrl);
      if (models.length === 0) {
        console.log(pc.yellow(`No models found at ${baseUrl} (is Ollama running?)`));
        return;
      }
      const used = new Set([...settings.advisors.map((a) => a.model), settings.chairmanModel]);
      for (const m of models) console.log(`${used.has(m) ? pc.green('●') : pc.dim('○')} ${m}`);
    });
}
