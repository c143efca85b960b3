/**
 * Process-wide engine configuration.
 *
 * @module config
 */

import { z } from 'zod';
import { ValidationError, type FieldValidationError } from './errors/index.js';
import { createLogger, type LogHandler, type SeriesLogger } from './observability/index.js';

/** How two-series joins locate matching keys */
export type JoinStrategy = 'merge' | 'hash' | 'auto';

const engineConfigSchema = z.object({
  joinStrategy: z.enum(['merge', 'hash', 'auto']),
  hashJoinRatio: z.number().finite().positive(),
  validateInputs: z.boolean(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
});

export interface EngineConfig extends z.infer<typeof engineConfigSchema> {
  /** Join strategy used when an operation does not pass one */
  joinStrategy: JoinStrategy;
  /** `'auto'` picks the hash strategy once the larger input is this many times the smaller one */
  hashJoinRatio: number;
  /** Check ascending key order on every join, window and resample input */
  validateInputs: boolean;
  /** Receives the engine's log entries; the engine is silent without one */
  logHandler?: LogHandler;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  joinStrategy: 'auto',
  hashJoinRatio: 8,
  validateInputs: false,
  logLevel: 'info',
};

let current: EngineConfig = { ...DEFAULT_ENGINE_CONFIG };
let logger: SeriesLogger | null = null;

/**
 * Merge options into the engine configuration.
 *
 * @throws ValidationError (SERIATE_A203) listing every invalid field
 *
 * @example
 * ```typescript
 * configureEngine({ joinStrategy: 'merge', validateInputs: true });
 * ```
 */
export function configureEngine(options: Partial<EngineConfig>): EngineConfig {
  const { logHandler, ...scalars } = options;
  const result = engineConfigSchema.partial().strict().safeParse(scalars);

  if (!result.success) {
    const errors: FieldValidationError[] = result.error.errors.map((e) => ({
      path: e.path.length > 0 ? e.path.join('.') : '(root)',
      message: e.message,
    }));
    throw new ValidationError(errors, 'SERIATE_A203');
  }

  const updates = result.data;
  current = {
    joinStrategy: updates.joinStrategy ?? current.joinStrategy,
    hashJoinRatio: updates.hashJoinRatio ?? current.hashJoinRatio,
    validateInputs: updates.validateInputs ?? current.validateInputs,
    logLevel: updates.logLevel ?? current.logLevel,
    logHandler: 'logHandler' in options ? logHandler : current.logHandler,
  };
  logger = null;
  return getEngineConfig();
}

/** Snapshot of the engine configuration */
export function getEngineConfig(): EngineConfig {
  return { ...current };
}

/** Restore the defaults */
export function resetEngineConfig(): void {
  current = { ...DEFAULT_ENGINE_CONFIG };
  logger = null;
}

/** Logger for an engine module, built from the configured level and handler */
export function getEngineLogger(module: string): SeriesLogger {
  logger ??= createLogger({
    module: 'seriate',
    level: current.logLevel,
    handler: current.logHandler,
  });
  return logger.child(module);
}
