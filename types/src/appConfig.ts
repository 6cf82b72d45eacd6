import type { ProviderName, ProviderSpec } from './provider.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Type definition for the process configuration, built once from the environment.
 * Frozen after construction; re-read the environment to get a new one.
 */
export type ConfigSnapshot = {
  /** Every known integration, keyed by name. */
  providers: Readonly<Record<ProviderName, ProviderSpec>>;

  /** Request timeout handed to provider calls, in seconds. */
  timeoutSeconds: number;

  /** Retry budget handed to provider calls. */
  maxRetries: number;

  /** Path of the application database. Not interpreted here. */
  storagePath: string;

  /** Suggested questions served to the dashboard. Never empty. */
  presetQuestions: readonly string[];

  /** Origins accepted by CORS. No duplicates; `*` accepts any origin. */
  allowedOrigins: readonly string[];

  developmentMode: boolean;

  port: number;

  logLevel: LogLevel;
};
