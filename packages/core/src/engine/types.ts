import type { FolderDestination, ResolvedDestination } from '../types.js';

/** Diagnostics sink. Defaults to the console; tests pass a silent one. */
export type Logger = Pick<Console, 'debug' | 'warn'>;

/** Evaluation clock, injected so date and time conditions are reproducible. */
export type Clock = () => Date;

/**
 * Turns a placeholder destination into a concrete, access-granted one.
 * Returning `null` (or throwing) means the destination cannot be used now.
 */
export interface DestinationResolver {
  resolve(destination: FolderDestination): ResolvedDestination | null;
}

export interface EngineOptions {
  resolver: DestinationResolver;
  now?: Clock;
  logger?: Logger;
}

export interface EvaluationContext {
  now: Date;
  logger: Logger;
}

export const silentLogger: Logger = {
  debug: () => undefined,
  warn: () => undefined,
};
