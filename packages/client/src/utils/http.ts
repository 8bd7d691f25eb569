import ky, { type KyInstance } from 'ky';
import type { ClientConfig } from '../config.js';
import {
  AuthenticationError,
  AuthorizationError,
  BadRequestError,
  HttpError,
  type HttpErrorBody,
  NotFoundError,
  RateLimitError,
  ServerError,
  TransportError,
} from '../errors/index.js';
import { apiErrorSchema, jsonValueSchema } from '../schemas/index.js';

/**
 * Read a response body as text. The status line has already arrived, but
 * the connection can still drop while the body streams in.
 */
export async function readResponseText(
  response: Response,
  url: string,
): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    if (error instanceof Error) {
      throw new TransportError(
        `Connection lost while reading response: ${url}: ${error.message}`,
        error,
      );
    }
    throw error;
  }
}

/**
 * Read a failed response body: JSON when it parses, raw text otherwise
 */
async function readErrorBody(
  response: Response,
  url: string,
): Promise<HttpErrorBody> {
  const text = await readResponseText(response, url);
  if (text === '') {
    return null;
  }

  try {
    const parsed = jsonValueSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : text;
  } catch {
    return text;
  }
}

/**
 * Transform a non-2xx response to HttpError
 */
export async function transformHttpError(
  response: Response,
  url: string = response.url,
): Promise<HttpError> {
  const status = response.status;

  const body = await readErrorBody(response, url);

  // Sentry reports failures as { detail }, proxies often as { error } or { message }
  let errorMessage = `HTTP ${status} error`;
  const parsed = apiErrorSchema.safeParse(body);
  if (parsed.success) {
    errorMessage =
      parsed.data.detail || parsed.data.error || parsed.data.message || errorMessage;
  }

  // Map status codes to specific error types
  switch (status) {
    case 400:
      return new BadRequestError(errorMessage, body);
    case 401:
      return new AuthenticationError(errorMessage, body);
    case 403:
      return new AuthorizationError(errorMessage, body);
    case 404:
      return new NotFoundError(errorMessage, body);
    case 429: {
      const retryAfter = response.headers.get('Retry-After');
      return new RateLimitError(errorMessage, body, retryAfter ?? undefined);
    }
    case 500:
    case 502:
    case 503:
    case 504:
      return new ServerError(errorMessage, status, body);
    default:
      return new HttpError(errorMessage, status, body);
  }
}

/**
 * Create a configured ky instance with auth and logging hooks.
 * Retries are disabled; retry policy belongs to the caller. Non-2xx
 * responses are returned as-is and mapped by {@link transformHttpError}.
 */
export function createKyInstance(config: ClientConfig): KyInstance {
  const headers: Record<string, string> = {
    ...config.headers,
    Authorization: `Bearer ${config.token}`,
  };
  const { logger } = config;

  return ky.create({
    timeout: config.timeout ?? 30000,
    retry: 0,
    throwHttpErrors: false,
    headers,
    hooks: {
      beforeRequest: [
        (request) => {
          logger?.debug(`${request.method} ${request.url}`);
        },
      ],
      afterResponse: [
        (request, _options, response) => {
          logger?.debug(`${request.method} ${request.url} -> ${response.status}`, {
            status: response.status,
          });
        },
      ],
    },
  });
}
