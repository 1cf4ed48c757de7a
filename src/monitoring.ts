/**
 * Call statistics and model-host health probes.
 */

import { z } from 'zod';
import type { CallObserver, CallRecord } from './types.js';

// ── Call statistics ──

export interface ModelStats {
  count: number;
  errors: number;
  averageLatencyMs: number;
}

export interface StatsSnapshot {
  global: {
    totalRequests: number;
    failedRequests: number;
    averageLatencyMs: number;
  };
  models: Record<string, ModelStats>;
}

interface ModelCounters {
  count: number;
  errors: number;
  totalLatencyMs: number;
}

const round2 = (n: number) => Math.round(n * 100) / 100;

/** Failed calls kept for `recentFailures` */
export const FAILURE_HISTORY = 50;

/**
 * In-memory counters fed by the pipeline's call records. Latency averages
 * cover successful calls only.
 */
export class StatsRecorder implements CallObserver {
  private total = 0;
  private failed = 0;
  private totalLatencyMs = 0;
  private models = new Map<string, ModelCounters>();
  private failures: CallRecord[] = [];

  record(call: CallRecord): void {
    this.total++;
    const counters = this.models.get(call.model) ?? { count: 0, errors: 0, totalLatencyMs: 0 };
    counters.count++;
    if (call.ok) {
      this.totalLatencyMs += call.latencyMs;
      counters.totalLatencyMs += call.latencyMs;
    } else {
      this.failed++;
      counters.errors++;
      this.failures.push(call);
      if (this.failures.length > FAILURE_HISTORY) this.failures.shift();
    }
    this.models.set(call.model, counters);
  }

  /** The last FAILURE_HISTORY failed calls, oldest first. */
  recentFailures(): CallRecord[] {
    return [...this.failures];
  }

  snapshot(): StatsSnapshot {
    const successes = this.total - this.failed;
    const models: Record<string, ModelStats> = {};
    for (const [model, c] of this.models) {
      const ok = c.count - c.errors;
      models[model] = {
        count: c.count,
        errors: c.errors,
        averageLatencyMs: ok > 0 ? round2(c.totalLatencyMs / ok) : 0,
      };
    }
    return {
      global: {
        totalRequests: this.total,
        failedRequests: this.failed,
        averageLatencyMs: successes > 0 ? round2(this.totalLatencyMs / successes) : 0,
      },
      models,
    };
  }
}

/** Fan one record out to several observers. */
export function combineObservers(...observers: Array<CallObserver | undefined>): CallObserver {
  const active = observers.filter((o): o is CallObserver => o !== undefined);
  return {
    record(call) {
      for (const o of active) o.record(call);
    },
  };
}

// ── Host probes (Ollama API) ──

export interface RunningModel {
  name: string;
  size?: number;
  expiresAt?: string;
}

export interface GatewayStatus {
  service: 'online' | 'offline' | 'error';
  version: string | null;
  runningModels: RunningModel[];
  error?: string;
}

const PROBE_TIMEOUT_MS = 2000;

function hostRoot(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '').replace(/\/v1$/, '').replace(/\/api\/chat$/, '');
}

const VersionSchema = z.object({ version: z.string().optional() });

const ModelListSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        size: z.number().optional(),
        expires_at: z.string().optional(),
      }),
    )
    .default([]),
});

function parseModels(data: unknown): RunningModel[] {
  const parsed = ModelListSchema.safeParse(data);
  if (!parsed.success) return [];
  return parsed.data.models.map((m) => ({
    name: m.name,
    ...(m.size !== undefined ? { size: m.size } : {}),
    ...(m.expires_at !== undefined ? { expiresAt: m.expires_at } : {}),
  }));
}

/**
 * Probe an Ollama host: version, then the models currently loaded. Never
 * rejects; an unreachable host reports `offline`.
 */
export async function getGatewayStatus(baseUrl: string): Promise<GatewayStatus> {
  const root = hostRoot(baseUrl);
  const status: GatewayStatus = { service: 'offline', version: null, runningModels: [] };

  try {
    const resp = await fetch(`${root}/api/version`, { signal: AbortSignal.timeout(PROBE_TIMEOUT_MS) });
    if (!resp.ok) {
      status.service = 'error';
      status.error = `HTTP ${resp.status} from /api/version`;
      return status;
    }
    const parsed = VersionSchema.safeParse(await resp.json());
    status.service = 'online';
    status.version = parsed.success ? (parsed.data.version ?? null) : null;
  } catch (err) {
    status.error = err instanceof Error ? err.message : String(err);
    return status;
  }

  // /api/ps only exists on recent Ollama releases; a miss leaves the list empty
  try {
    const resp = await fetch(`${root}/api/ps`, { signal: AbortSignal.timeout(PROBE_TIMEOUT_MS) });
    if (resp.ok) status.runningModels = parseModels(await resp.json());
  } catch (err) {
    status.error = `running models unavailable: ${err instanceof Error ? err.message : String(err)}`;
  }
  return status;
}

/** Model names installed on an Ollama host; [] when unreachable. */
export async function listHostModels(baseUrl: string): Promise<string[]> {
  try {
    const resp = await fetch(`${hostRoot(baseUrl)}/api/tags`, {
      signal: AbortSignal.timeout(PROBE_TIMEOUT_MS),
    });
    if (!resp.ok) return [];
    return parseModels(await resp.json()).map((m) => m.name);
  } catch {
    // Host not running
    return [];
  }
}
