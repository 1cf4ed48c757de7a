import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { CouncilSettings, ModelGateway } from '../types.js';

// Mock modules before importing the module under test
vi.mock('../config.js', () => ({
  loadConfig: vi.fn(),
  resolveConfigPath: vi.fn(() => '/home/test/.advisor-council/config.yaml'),
}));

vi.mock('../providers/base.js', async () => {
  const actual = await vi.importActual<typeof import('../providers/base.js')>('../providers/base.js');
  return { ...actual, createGateway: vi.fn() };
});

vi.mock('../monitoring.js', async () => {
  const actual = await vi.importActual<typeof import('../monitoring.js')>('../monitoring.js');
  return { ...actual, getGatewayStatus: vi.fn(), listHostModels: vi.fn() };
});

import { runDoctor } from './doctor.js';
import { loadConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { getGatewayStatus, listHostModels } from '../monitoring.js';
import { createGateway } from '../providers/base.js';

const settings: CouncilSettings = {
  gateway: { provider: 'ollama', timeout: 300 },
  advisors: [{ id: 'alpha', name: 'Alpha', model: 'llama3.2:latest', prompt: 'alpha.md' }],
  chairmanModel: 'mistral:latest',
  personasDir: '/nonexistent',
  dataDir: '/nonexistent',
};

function gatewayReplying(content: string): ModelGateway {
  return { invoke: vi.fn(async () => ({ content })) };
}

let output: string[];

beforeEach(() => {
  vi.clearAllMocks();
  output = [];
  vi.spyOn(console, 'log').mockImplementation((line?: unknown) => {
    output.push(String(line ?? ''));
  });
  vi.mocked(loadConfig).mockResolvedValue(settings);
  vi.mocked(getGatewayStatus).mockResolvedValue({ service: 'online', version: '0.5.1', runningModels: [] });
  vi.mocked(listHostModels).mockResolvedValue(['llama3.2:latest', 'mistral:latest']);
  vi.mocked(createGateway).mockReturnValue(gatewayReplying('ok'));
});

describe('doctor', () => {
  it('returns 0 when the host and chairman respond', async () => {
    const code = await runDoctor('/nonexistent/council.yaml');
    expect(code).toBe(0);
    expect(output.some((l) => l.includes('all 2 installed'))).toBe(true);
  });

  it('warns about models that are not installed', async () => {
    vi.mocked(listHostModels).mockResolvedValue(['llama3.2:latest']);
    const code = await runDoctor('/nonexistent/council.yaml');
    expect(code).toBe(0);
    expect(output.some((l) => l.includes('not installed: mistral:latest'))).toBe(true);
  });

  it('returns 1 when the host is offline', async () => {
    vi.mocked(getGatewayStatus).mockResolvedValue({
      service: 'offline',
      version: null,
      runningModels: [],
      error: 'fetch failed',
    });
    expect(await runDoctor('/nonexistent/council.yaml')).toBe(1);
  });

  it('returns 1 when the chairman probe fails', async () => {
    vi.mocked(createGateway).mockReturnValue({
      invoke: vi.fn(async () => {
        throw new Error('model "mistral:latest" not found');
      }),
    });
    expect(await runDoctor('/nonexistent/council.yaml')).toBe(1);
  });

  it('returns 1 and skips the probes when the config is invalid', async () => {
    vi.mocked(loadConfig).mockRejectedValue(new ConfigError('Invalid council config'));
    expect(await runDoctor('/nonexistent/council.yaml')).toBe(1);
    expect(getGatewayStatus).not.toHaveBeenCalled();
    expect(createGateway).not.toHaveBeenCalled();
  });
});
