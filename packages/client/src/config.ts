/**
 * Default API root, used when `baseUrl` is omitted
 */
export const DEFAULT_BASE_URL = 'https://sentry.io/api/0/';

/**
 * Receives one line per request and per response when configured
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
}

/**
 * Configuration options for SentryClient and Transceiver
 */
export interface ClientConfig {
  /**
   * Authentication token, sent as `Authorization: Bearer <token>`
   */
  token: string;

  /**
   * Root that relative endpoints resolve against
   * @default 'https://sentry.io/api/0/'
   */
  baseUrl?: string;

  /**
   * Request timeout in milliseconds
   * @default 30000 (30 seconds)
   */
  timeout?: number;

  /**
   * Custom headers to include in all requests
   */
  headers?: Record<string, string>;

  /**
   * Request/response logger; nothing is logged when omitted
   */
  logger?: Logger;
}
