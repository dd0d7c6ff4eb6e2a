import { ZodError } from 'zod';
import { Errors } from './schemas';
import type { Id } from './types';

export class NetlaceError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(payload: { code: string; message: string; details?: Record<string, unknown> }) {
    super(payload.message);
    this.name = new.target.name;
    this.code = payload.code;
    this.details = payload.details;
  }
}

/** Raised while a node type is being declared; never deferred to first use. */
export class ConfigError extends NetlaceError {
  constructor(message: string) {
    super(Errors.CONFIG(message));
  }

  static fromZod(context: string, err: ZodError): ConfigError {
    const issues = err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    return new ConfigError(`${context}: ${issues.join('; ')}`);
  }
}

/** Raised by UnionView#find when not every requested id resolves. */
export class NotFoundError extends NetlaceError {
  readonly ids: readonly Id[];

  constructor(ids: readonly Id[]) {
    super(Errors.NOT_FOUND(ids));
    this.ids = ids;
  }
}

export class UnknownNameError extends NetlaceError {
  constructor(kind: 'entity' | 'accessor', name: string) {
    super(Errors.UNKNOWN(kind, name));
  }
}

export class UnsupportedError extends NetlaceError {
  constructor(message: string) {
    super(Errors.UNSUPPORTED(message));
  }
}
