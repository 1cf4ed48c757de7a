import type { GatewayErrorKind } from './types.js';

export class ConfigError extends Error {
  constructor(message: string, public path?: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class PersonaError extends Error {
  constructor(message: string, public ref: string) {
    super(message);
    this.name = 'PersonaError';
  }
}

export class GatewayError extends Error {
  constructor(message: string, public kind: GatewayErrorKind) {
    super(message);
    this.name = 'GatewayError';
  }
}

export class EmptyRosterError extends Error {
  constructor() {
    super('No advisors configured; the council cannot deliberate without at least one advisor');
    this.name = 'EmptyRosterError';
  }
}

export class DeliberationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeliberationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Classify an arbitrary failure for the call record. */
export function errorKind(err: unknown): GatewayErrorKind {
  if (err instanceof GatewayError) return err.kind;
  const msg = errorMessage(err);
  if (/timed out|timeout|aborted/i.test(msg)) return 'timeout';
  return 'transport';
}
