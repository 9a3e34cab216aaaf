/**
 * Configuration for the Firebase client.
 * @module config
 */

import { z } from 'zod';
import { FirebaseError } from '../errors/index.js';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 30000;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'firebase-rtdb-ts/0.1.0';

/**
 * Options accepted by {@link FirebaseConfig.create}.
 */
export interface FirebaseConfigOptions {
  /** Database URL, e.g. `https://my-db.firebaseio.com`. */
  databaseUrl: string;
  /** Static credential sent as the `auth` query parameter. */
  authKey?: string;
  /** Request timeout in milliseconds. */
  timeout?: number;
  /** User-Agent header. */
  userAgent?: string;
  /** Extra headers sent with every request. */
  customHeaders?: Record<string, string>;
}

const configSchema = z.object({
  databaseUrl: z
    .string()
    .url()
    .refine((url) => url.startsWith('https://'), { message: 'Database URL must use https' }),
  authKey: z.string().min(1, 'Auth key cannot be empty').optional(),
  timeout: z.number().int().positive(),
  userAgent: z.string().trim().min(1, 'User-Agent cannot be empty'),
  customHeaders: z.record(z.string()),
});

/**
 * Validated client configuration.
 */
export class FirebaseConfig {
  readonly databaseUrl: string;
  readonly authKey?: string;
  readonly timeout: number;
  readonly userAgent: string;
  readonly customHeaders: Readonly<Record<string, string>>;

  private constructor(values: z.infer<typeof configSchema>) {
    this.databaseUrl = values.databaseUrl;
    this.authKey = values.authKey;
    this.timeout = values.timeout;
    this.userAgent = values.userAgent;
    this.customHeaders = { ...values.customHeaders };
  }

  /**
   * Creates a new configuration builder.
   */
  static builder(): FirebaseConfigBuilder {
    return new FirebaseConfigBuilder();
  }

  /**
   * Validates options and creates the configuration.
   * @throws FirebaseError with code `configuration` when validation fails.
   */
  static create(options: FirebaseConfigOptions): FirebaseConfig {
    const parsed = configSchema.safeParse({
      databaseUrl: options.databaseUrl,
      authKey: options.authKey,
      timeout: options.timeout ?? DEFAULT_TIMEOUT,
      userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
      customHeaders: options.customHeaders ?? {},
    });

    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw FirebaseError.configuration(issues.join('; '));
    }

    return new FirebaseConfig(parsed.data);
  }

  /**
   * Creates configuration from environment variables.
   *
   * Environment variables:
   * - FIREBASE_DATABASE_URL: Database URL (required)
   * - FIREBASE_AUTH_KEY: Static auth credential
   * - FIREBASE_TIMEOUT_MS: Request timeout in milliseconds
   * - FIREBASE_USER_AGENT: Custom User-Agent string
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): FirebaseConfig {
    const databaseUrl = env.FIREBASE_DATABASE_URL;
    if (!databaseUrl) {
      throw FirebaseError.configuration('FIREBASE_DATABASE_URL environment variable is not set');
    }

    const builder = new FirebaseConfigBuilder().databaseUrl(databaseUrl);

    if (env.FIREBASE_AUTH_KEY) {
      builder.authKey(env.FIREBASE_AUTH_KEY);
    }

    const timeout = env.FIREBASE_TIMEOUT_MS;
    if (timeout) {
      const parsed = parseInt(timeout, 10);
      if (isNaN(parsed)) {
        throw FirebaseError.configuration(`FIREBASE_TIMEOUT_MS is not a number: ${timeout}`);
      }
      builder.timeout(parsed);
    }

    if (env.FIREBASE_USER_AGENT) {
      builder.userAgent(env.FIREBASE_USER_AGENT);
    }

    return builder.build();
  }
}

/**
 * Builder for {@link FirebaseConfig}.
 */
export class FirebaseConfigBuilder {
  private options: Partial<FirebaseConfigOptions> = {};

  databaseUrl(url: string): this {
    this.options.databaseUrl = url.trim();
    return this;
  }

  authKey(key: string): this {
    this.options.authKey = key;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.options.timeout = ms;
    return this;
  }

  userAgent(userAgent: string): this {
    this.options.userAgent = userAgent;
    return this;
  }

  /**
   * Adds a header sent with every request.
   */
  header(key: string, value: string): this {
    this.options.customHeaders = {
      ...this.options.customHeaders,
      [key]: value,
    };
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws FirebaseError with code `configuration` when validation fails.
   */
  build(): FirebaseConfig {
    const { databaseUrl } = this.options;
    if (!databaseUrl) {
      throw FirebaseError.configuration('Database URL is required');
    }
    return FirebaseConfig.create({ ...this.options, databaseUrl });
  }
}
