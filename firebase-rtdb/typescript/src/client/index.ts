/**
 * Firebase Realtime Database client.
 */

import type { z } from 'zod';
import { AtomicUpdater, type ApplyDeltaOptions } from '../atomic/index.js';
import { FirebaseConfig, type FirebaseConfigOptions } from '../config/index.js';
import { type DatabaseResponse, RequestDispatcher, type SendOptions } from '../dispatcher/index.js';
import { FirebaseError, type Result, err, ok, toError } from '../errors/index.js';
import { EventStreamAdapter } from '../events/adapter.js';
import { FetchEventSource, type EventSourceTransport } from '../events/transport.js';
import type { DatabaseEvent, EventHandler, StreamOptions } from '../events/types.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { NoopMetricsCollector, type MetricsCollector } from '../observability/metrics.js';
import { Reference } from '../reference/index.js';
import { FetchTransport, type HttpMethod, type HttpTransport } from '../transport/index.js';

/**
 * Collaborators that replace the defaults.
 */
export interface FirebaseClientOptions {
  /** Custom transport implementation. */
  transport?: HttpTransport;
  /** Custom SSE transport implementation. */
  eventTransport?: EventSourceTransport;
  /** Custom logger. Defaults to a no-op logger. */
  logger?: Logger;
  /** Custom metrics collector. */
  metrics?: MetricsCollector;
}

/**
 * The main Firebase client.
 *
 * @example
 * ```typescript
 * const client = FirebaseClient.builder()
 *   .databaseUrl('https://my-db.firebaseio.com')
 *   .authKey(process.env.FIREBASE_AUTH_KEY ?? '')
 *   .build();
 *
 * const visits = client.ref('stats/visits');
 * const result = await client.increment(visits, 1);
 * ```
 */
export class FirebaseClient {
  private readonly config: FirebaseConfig;
  private readonly root: Reference;
  private readonly logger: Logger;
  private readonly metricsCollector: MetricsCollector;
  private readonly dispatcher: RequestDispatcher;
  private readonly atomic: AtomicUpdater;
  private readonly events: EventStreamAdapter;

  private constructor(config: FirebaseConfig, root: Reference, options: FirebaseClientOptions) {
    this.config = config;
    this.root = root;
    this.logger = options.logger ?? new NoopLogger();
    this.metricsCollector = options.metrics ?? new NoopMetricsCollector();

    const headers = { 'User-Agent': config.userAgent, ...config.customHeaders };

    this.dispatcher = new RequestDispatcher({
      transport: options.transport ?? new FetchTransport(config),
      logger: this.logger,
      metrics: this.metricsCollector,
      headers,
    });
    this.atomic = new AtomicUpdater(this.dispatcher, this.logger, this.metricsCollector);
    this.events = new EventStreamAdapter(
      options.eventTransport ?? new FetchEventSource({ headers }),
      this.logger,
      this.metricsCollector
    );
  }

  /**
   * Creates a new client builder.
   */
  static builder(): FirebaseClientBuilder {
    return new FirebaseClientBuilder();
  }

  /**
   * Creates a client from environment variables.
   */
  static fromEnv(options: FirebaseClientOptions = {}): FirebaseClient {
    return FirebaseClient.create(FirebaseConfig.fromEnv(), options);
  }

  /**
   * Creates a client from a validated configuration.
   * @throws FirebaseError with code `configuration` when the database URL is unusable.
   */
  static create(config: FirebaseConfig, options: FirebaseClientOptions = {}): FirebaseClient {
    const root = config.authKey !== undefined
      ? Reference.createWithAuth(config.databaseUrl, config.authKey)
      : Reference.create(config.databaseUrl);
    if (!root.success) {
      throw FirebaseError.configuration(root.error.message);
    }
    return new FirebaseClient(config, root.data, options);
  }

  /**
   * Returns a reference to `path`, or to the root document (`/.json`).
   */
  ref(path = ''): Reference {
    return this.root.at(path);
  }

  /**
   * Reads the raw JSON text stored at `ref`.
   */
  async get(ref: Reference): Promise<Result<DatabaseResponse>> {
    return this.dispatcher.send(ref, 'GET');
  }

  /**
   * Reads and parses the value stored at `ref`, validating it against
   * `schema` when one is given.
   */
  async getJson(ref: Reference): Promise<Result<unknown>>;
  async getJson<T>(ref: Reference, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<Result<T>>;
  async getJson<T>(
    ref: Reference,
    schema?: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<Result<T> | Result<unknown>> {
    const response = await this.get(ref);
    if (!response.success) {
      return response;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(response.data.data);
    } catch (error) {
      return err(FirebaseError.notJson(`response at ${ref.path} is not JSON`, toError(error)));
    }

    if (!schema) {
      return ok(parsed);
    }

    const validated = schema.safeParse(parsed);
    if (!validated.success) {
      const issues = validated.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      return err(FirebaseError.notJson(`response at ${ref.path} does not match schema: ${issues.join('; ')}`));
    }
    return ok(validated.data);
  }

  /**
   * Appends `data` under a server-generated key. The response body is
   * `{"name": "<key>"}`.
   */
  async push(ref: Reference, data: unknown): Promise<Result<DatabaseResponse>> {
    return this.dispatcher.send(ref, 'POST', { body: data });
  }

  /**
   * Replaces the value at `ref`.
   */
  async set(ref: Reference, data: unknown, options: Omit<SendOptions, 'body'> = {}): Promise<Result<DatabaseResponse>> {
    return this.dispatcher.send(ref, 'PUT', { ...options, body: data });
  }

  /**
   * Merges the children of `data` into the value at `ref`.
   */
  async update(ref: Reference, data: Record<string, unknown>): Promise<Result<DatabaseResponse>> {
    return this.dispatcher.send(ref, 'PATCH', { body: data });
  }

  async delete(ref: Reference, options: Omit<SendOptions, 'body'> = {}): Promise<Result<DatabaseResponse>> {
    return this.dispatcher.send(ref, 'DELETE', options);
  }

  /**
   * Sends a request with full control over the options.
   */
  async send(ref: Reference, method: HttpMethod, options: SendOptions = {}): Promise<Result<DatabaseResponse>> {
    return this.dispatcher.send(ref, method, options);
  }

  /**
   * Atomically adds `delta` to the number stored at `ref`.
   */
  async increment(ref: Reference, delta: number, options: ApplyDeltaOptions = {}): Promise<Result<DatabaseResponse>> {
    return this.atomic.applyDelta(ref, delta, options);
  }

  /**
   * Streams the change events of `ref`.
   */
  stream(ref: Reference, options: StreamOptions = {}): AsyncGenerator<Result<DatabaseEvent>, void, undefined> {
    return this.events.stream(ref, options);
  }

  /**
   * Delivers the change events of `ref` to `handler` until the stream ends.
   */
  async listen(ref: Reference, handler: EventHandler, options: StreamOptions = {}): Promise<void> {
    return this.events.listen(ref, handler, options);
  }

  /**
   * Returns the metrics collector.
   */
  metrics(): MetricsCollector {
    return this.metricsCollector;
  }

  /**
   * Returns the logger.
   */
  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Returns the configuration.
   */
  getConfig(): FirebaseConfig {
    return this.config;
  }
}

/**
 * Builder for the Firebase client.
 */
export class FirebaseClientBuilder {
  private config: Partial<FirebaseConfigOptions> = {};
  private options: FirebaseClientOptions = {};

  databaseUrl(url: string): this {
    this.config.databaseUrl = url;
    return this;
  }

  authKey(key: string): this {
    this.config.authKey = key;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  /**
   * Adds a header sent with every request.
   */
  header(key: string, value: string): this {
    this.config.customHeaders = { ...this.config.customHeaders, [key]: value };
    return this;
  }

  transport(transport: HttpTransport): this {
    this.options.transport = transport;
    return this;
  }

  eventTransport(transport: EventSourceTransport): this {
    this.options.eventTransport = transport;
    return this;
  }

  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  metrics(collector: MetricsCollector): this {
    this.options.metrics = collector;
    return this;
  }

  /**
   * Builds the client.
   * @throws FirebaseError with code `configuration` when validation fails.
   */
  build(): FirebaseClient {
    const configBuilder = FirebaseConfig.builder();

    if (this.config.databaseUrl !== undefined) {
      configBuilder.databaseUrl(this.config.databaseUrl);
    }
    if (this.config.authKey !== undefined) {
      configBuilder.authKey(this.config.authKey);
    }
    if (this.config.timeout !== undefined) {
      configBuilder.timeout(this.config.timeout);
    }
    if (this.config.userAgent !== undefined) {
      configBuilder.userAgent(this.config.userAgent);
    }
    for (const [key, value] of Object.entries(this.config.customHeaders ?? {})) {
      configBuilder.header(key, value);
    }

    return FirebaseClient.create(configBuilder.build(), this.options);
  }
}
