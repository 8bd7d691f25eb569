import { type KyInstance, type ResponsePromise, TimeoutError } from 'ky';
import { type ClientConfig, DEFAULT_BASE_URL, type Logger } from './config.js';
import { TransportError, ValidationError } from './errors/index.js';
import type { BaseModel, ModelConstructor } from './models/base.js';
import {
  documentSchema,
  jsonValueSchema,
  pageSchema,
} from './schemas/index.js';
import type { ExtraFields, JsonValue, QueryParams } from './types/index.js';
import {
  createKyInstance,
  normalizeBaseUrl,
  parseLinkHeader,
  readResponseText,
  resolveUrl,
  transformHttpError,
  validate,
} from './utils/index.js';

export interface RequestOptions {
  /**
   * Query parameters appended to the endpoint URL
   */
  params?: QueryParams;
}

export interface ModelRequestOptions<M extends BaseModel>
  extends RequestOptions {
  /**
   * Model variant each JSON object is materialized as
   */
  model: ModelConstructor<M>;

  /**
   * Values handed to every materialized model besides its document
   */
  extraFields?: ExtraFields;
}

/**
 * Sole point of contact with the Sentry HTTP API.
 *
 * Owns the bearer token, issues requests, turns non-2xx responses and
 * connection failures into {@link HttpError} / {@link TransportError},
 * materializes models and follows pagination cursors.
 *
 * @example
 * ```typescript
 * const transceiver = new Transceiver({ token: 'your-api-token' });
 *
 * const org = await transceiver.get('organizations/acme/', { model: Organization });
 *
 * for await (const project of transceiver.paginateGet('projects/', { model: Project })) {
 *   console.log(project.slug);
 * }
 * ```
 */
export class Transceiver {
  private readonly http: KyInstance;

  private readonly baseUrl: string;

  private readonly logger?: Logger;

  constructor(config: ClientConfig) {
    this.http = createKyInstance(config);
    this.baseUrl = normalizeBaseUrl(config.baseUrl ?? DEFAULT_BASE_URL);
    this.logger = config.logger;
  }

  /**
   * GET one resource. Returns the parsed JSON, or one `model` instance
   * when a model is given.
   */
  get<M extends BaseModel>(
    endpoint: string,
    options: ModelRequestOptions<M>,
  ): Promise<M>;
  get(endpoint: string, options?: RequestOptions): Promise<JsonValue>;
  async get<M extends BaseModel>(
    endpoint: string,
    options: RequestOptions | ModelRequestOptions<M> = {},
  ): Promise<JsonValue | M> {
    const url = resolveUrl(endpoint, this.baseUrl, options.params);
    const response = await this.send(url, () => this.http.get(url));
    const body = await this.readBody(response, url);

    return this.hydrate(body, options);
  }

  /**
   * POST `data` as JSON. Same return contract as {@link get}.
   */
  post<M extends BaseModel>(
    endpoint: string,
    data: Readonly<Record<string, unknown>>,
    options: ModelRequestOptions<M>,
  ): Promise<M>;
  post(
    endpoint: string,
    data: Readonly<Record<string, unknown>>,
    options?: RequestOptions,
  ): Promise<JsonValue>;
  async post<M extends BaseModel>(
    endpoint: string,
    data: Readonly<Record<string, unknown>>,
    options: RequestOptions | ModelRequestOptions<M> = {},
  ): Promise<JsonValue | M> {
    const url = resolveUrl(endpoint, this.baseUrl, options.params);
    const response = await this.send(url, () =>
      this.http.post(url, { json: data }),
    );
    const body = await this.readBody(response, url);

    return this.hydrate(body, options);
  }

  /**
   * DELETE a resource. Resolves once the API answers 2xx.
   */
  async delete(endpoint: string): Promise<void> {
    const url = resolveUrl(endpoint, this.baseUrl);
    await this.send(url, () => this.http.delete(url));
  }

  /**
   * Lazily iterate every element of a paginated list endpoint.
   *
   * Pages are fetched one at a time, only once the consumer has taken
   * every element of the previous one. The next page is the `next`
   * cursor of the `Link` header; traversal ends when that cursor reports
   * `results="false"`, is absent, or a page comes back empty. Errors
   * surface when iteration reaches the failing page. A cursor pointing
   * at another origin than its page is rejected with ValidationError,
   * since the request would carry the bearer token.
   *
   * Each call starts over from the first page.
   */
  paginateGet<M extends BaseModel>(
    endpoint: string,
    options: ModelRequestOptions<M>,
  ): AsyncGenerator<M>;
  paginateGet(
    endpoint: string,
    options?: RequestOptions,
  ): AsyncGenerator<JsonValue>;
  async *paginateGet<M extends BaseModel>(
    endpoint: string,
    options: RequestOptions | ModelRequestOptions<M> = {},
  ): AsyncGenerator<JsonValue | M> {
    let url: string | undefined = resolveUrl(
      endpoint,
      this.baseUrl,
      options.params,
    );

    while (url !== undefined) {
      const pageUrl: string = url;
      const response = await this.send(pageUrl, () => this.http.get(pageUrl));
      const page = validate(
        await this.readBody(response, pageUrl),
        pageSchema,
        'Paginated response is not a JSON array',
      );

      if (page.length === 0) {
        return;
      }

      for (const element of page) {
        yield this.hydrate(element, options);
      }

      const { next } = parseLinkHeader(response.headers.get('Link'));
      if (next?.results) {
        url = this.followCursor(next.url, pageUrl);
        this.logger?.debug('Following next cursor', { cursor: next.cursor });
      } else {
        url = undefined;
      }
    }
  }

  /**
   * Construct a `model` instance from raw JSON. The JSON must be an object.
   * @throws {ValidationError} otherwise
   */
  materialize<M extends BaseModel>(
    json: JsonValue,
    model: ModelConstructor<M>,
    extraFields: ExtraFields = {},
  ): M {
    const document = validate(
      json,
      documentSchema,
      `${model.name} expects a JSON object`,
    );
    return new model(this, document, extraFields);
  }

  private hydrate<M extends BaseModel>(
    body: JsonValue,
    options: RequestOptions | ModelRequestOptions<M>,
  ): JsonValue | M {
    if (!('model' in options)) {
      return body;
    }
    return this.materialize(body, options.model, options.extraFields);
  }

  private followCursor(cursorUrl: string, pageUrl: string): string {
    const next = new URL(cursorUrl, pageUrl);
    const { origin } = new URL(pageUrl);
    if (next.origin !== origin) {
      throw new ValidationError(
        `Pagination cursor leaves ${origin}: ${next.toString()}`,
      );
    }
    return next.toString();
  }

  /**
   * Run a ky request. Connection-level failures become TransportError,
   * non-2xx responses HttpError. Bodies are read through
   * {@link readResponseText} so a connection dropped mid-body is a
   * TransportError too.
   */
  private async send(
    url: string,
    request: () => ResponsePromise,
  ): Promise<Response> {
    let response: Response;
    try {
      response = await request();
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new TransportError(`Request timed out: ${url}`, error);
      }
      if (error instanceof Error) {
        throw new TransportError(
          `Request failed: ${url}: ${error.message}`,
          error,
        );
      }
      throw error;
    }

    if (!response.ok) {
      throw await transformHttpError(response, url);
    }
    return response;
  }

  private async readBody(response: Response, url: string): Promise<JsonValue> {
    const text = await readResponseText(response, url);
    if (text === '') {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new ValidationError('Response body is not valid JSON');
    }

    return validate(parsed, jsonValueSchema);
  }
}
