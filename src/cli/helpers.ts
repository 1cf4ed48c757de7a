import { homedir } from 'node:os';
import chalk from 'chalk';
import { BUILTIN_PERSONAS_DIR } from '../config.js';
import { createPromptLoader } from '../persona.js';
import type { StatsSnapshot } from '../monitoring.js';
import type { AggregateRankingEntry, CouncilSettings, SystemPromptLoader } from '../types.js';

export class CLIError extends Error {
  constructor(message: string, public exitCode: number = 1) {
    super(message);
    this.name = 'CLIError';
  }
}

export async function readStdin(timeoutMs = 5000): Promise<string> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    const timer = setTimeout(() => {
      process.stdin.destroy();
      resolve(Buffer.concat(chunks).toString('utf-8'));
    }, timeoutMs);
    process.stdin.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });
    process.stdin.on('end', () => {
      clearTimeout(timer);
      resolve(Buffer.concat(chunks).toString('utf-8'));
    });
    process.stdin.on('error', () => {
      clearTimeout(timer);
      resolve('');
    });
  });
}

/** Question from the argument, else piped stdin. */
export async function resolveQuestion(arg: string | undefined, usage: string): Promise<string> {
  if (arg?.trim()) return arg.trim();
  if (process.stdin.isTTY) {
    throw new CLIError(chalk.red('No question provided.') + '\n' + chalk.dim(usage));
  }
  const piped = (await readStdin()).trim();
  if (!piped) throw new CLIError(chalk.red('Empty input.'));
  return piped;
}

export function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new CLIError(
      chalk.red(`Invalid --timeout value: "${value}". Must be a positive number of seconds.`),
    );
  }
  return seconds * 1000;
}

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/** Persona loader over the user's persona directory, then the bundled one. */
export function promptLoaderFor(settings: CouncilSettings): SystemPromptLoader {
  return createPromptLoader([settings.personasDir, BUILTIN_PERSONAS_DIR]);
}

export function tildefy(path: string): string {
  const home = homedir();
  return path.startsWith(home) ? '~' + path.slice(home.length) : path;
}

export function pad(s: string, len: number): string {
  return s.length >= len ? s : s + ' '.repeat(len - s.length);
}

export function formatAggregate(aggregate: readonly AggregateRankingEntry[]): string[] {
  if (aggregate.length === 0) return [chalk.dim('  (no parseable rankings)')];
  const width = Math.max(...aggregate.map((a) => a.advisor.length));
  return aggregate.map(
    (a, i) =>
      `  ${i + 1}. ${chalk.bold(pad(a.advisor, width))}  ${chalk.dim(a.model)}  avg ${a.averageRank.toFixed(2)} ${chalk.dim(`(${a.votes} vote${a.votes === 1 ? '' : 's'})`)}`,
  );
}

export function formatStats(stats: StatsSnapshot): string[] {
  const g = stats.global;
  const lines = [
    chalk.bold('Calls'),
    `  ${g.totalRequests} total, ${g.failedRequests} failed, avg ${g.averageLatencyMs}ms`,
  ];
  for (const [model, m] of Object.entries(stats.models)) {
    lines.push(`  ${pad(model, 24)} ${m.count} call(s), ${m.errors} error(s), avg ${m.averageLatencyMs}ms`);
  }
  return lines;
}

export function formatTime(ms: number): string {
  return new Date(ms).toISOString().replace('T', ' ').slice(0, 16);
}
