/**
 * HTTP transport and REST-backed secret store.
 *
 * @module http
 */

import { z } from 'zod';
import {
  SecretNotFoundError,
  StoreRequestError,
  StoreTimeoutError,
  StoreUnavailableError,
  UnauthorizedError,
  errorMessage,
  isVaultAgentError,
} from '../errors/index.js';
import type {
  DatabaseOptions,
  IssueResult,
  LoginResult,
  ReadOptions,
  ReadResult,
  SecretStore,
  StaticCredentialResult,
} from '../types/index.js';

// ============================================================================
// Transport
// ============================================================================

/**
 * HTTP request structure.
 */
export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * HTTP response structure.
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Transport options.
 */
export interface TransportOptions {
  /**
   * Request timeout in milliseconds.
   */
  timeout?: number;
}

/**
 * HTTP transport interface.
 */
export interface Transport {
  /**
   * Send an HTTP request.
   *
   * @throws {StoreTimeoutError} When the request exceeds its deadline
   * @throws {StoreUnavailableError} When the request cannot be delivered
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Fetch-based HTTP transport.
 */
export class FetchTransport implements Transport {
  private readonly timeout: number;

  constructor(options: TransportOptions = {}) {
    this.timeout = options.timeout ?? 30000;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const body = await response.text();

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        headers,
        body,
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new StoreTimeoutError(`${request.method} ${new URL(request.url).pathname}`, this.timeout);
      }
      throw new StoreUnavailableError(`Request to secret store failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

// ============================================================================
// Response schemas
// ============================================================================

const LoginResponseSchema = z.object({
  auth: z.object({
    client_token: z.string().min(1),
    lease_duration: z.number().int().nonnegative(),
    renewable: z.boolean().optional(),
  }),
});

const KvV2ReadResponseSchema = z.object({
  data: z.object({
    data: z.record(z.unknown()),
    metadata: z.object({ version: z.number().int().positive() }).partial().optional(),
  }),
  lease_duration: z.number().int().nonnegative().optional(),
});

const KvV1ReadResponseSchema = z.object({
  data: z.record(z.unknown()),
  lease_duration: z.number().int().nonnegative().optional(),
});

const ListResponseSchema = z.object({
  data: z.object({
    keys: z.array(z.string()),
  }),
});

const IssueResponseSchema = z.object({
  lease_id: z.string(),
  lease_duration: z.number().int().nonnegative(),
  renewable: z.boolean().optional(),
  data: z.object({
    username: z.string(),
    password: z.string(),
  }),
});

const StaticCredentialResponseSchema = z.object({
  data: z.object({
    username: z.string(),
    password: z.string(),
    last_vault_rotation: z.string().optional(),
    rotation_period: z.number().optional(),
    ttl: z.number().optional(),
  }),
});

const ErrorResponseSchema = z.object({
  errors: z.array(z.string()),
});

// ============================================================================
// HttpSecretStore
// ============================================================================

/**
 * HttpSecretStore settings.
 */
export interface HttpSecretStoreOptions {
  /** Store base URL */
  address: string;
  /** Namespace sent as X-Vault-Namespace */
  namespace?: string;
  /** AppRole auth mount point */
  approleMountPoint: string;
  /** KV engine version of the KV mount */
  kvVersion: 1 | 2;
  /** Request timeout in milliseconds (used for the default transport) */
  requestTimeoutMs: number;
  /** Transport override */
  transport?: Transport;
}

/**
 * {@link SecretStore} over the store's REST API.
 *
 * Covers the AppRole login, KV v1/v2 read and list, and the database
 * engine's dynamic and static credential endpoints. Lease renewal,
 * revocation and the remaining engines are out of scope.
 *
 * @example
 * ```typescript
 * const store = new HttpSecretStore({
 *   address: 'https://vault.internal:8200',
 *   approleMountPoint: 'approle',
 *   kvVersion: 2,
 *   requestTimeoutMs: 10000,
 * });
 * const { token } = await store.login(roleId, secretId);
 * const secret = await store.read(token, 'app/db', { mount: 'secret' });
 * ```
 */
export class HttpSecretStore implements SecretStore {
  private readonly options: HttpSecretStoreOptions;
  private readonly transport: Transport;
  private readonly baseUrl: string;

  constructor(options: HttpSecretStoreOptions) {
    this.options = options;
    this.transport = options.transport ?? new FetchTransport({ timeout: options.requestTimeoutMs });
    this.baseUrl = options.address.replace(/\/+$/, '');
  }

  async login(roleId: string, secretId: string): Promise<LoginResult> {
    const body = await this.request({
      method: 'POST',
      path: `auth/${encodePath(this.options.approleMountPoint)}/login`,
      body: { role_id: roleId, secret_id: secretId },
      notFound: () => new StoreRequestError(`Auth mount not found: ${this.options.approleMountPoint}`, 404),
    });
    const { auth } = parseBody(LoginResponseSchema, body, 'login');
    return {
      token: auth.client_token,
      leaseDuration: auth.lease_duration,
      renewable: auth.renewable,
    };
  }

  async read(token: string, path: string, options: ReadOptions): Promise<ReadResult> {
    const notFound = () => new SecretNotFoundError('secret', path);

    if (this.options.kvVersion === 1) {
      if (options.version !== undefined) {
        throw new StoreRequestError(`KV version 1 mount "${options.mount}" does not keep versions`, 400);
      }
      const body = await this.request({ method: 'GET', token, path: `${encodePath(options.mount)}/${encodePath(path)}`, notFound });
      const parsed = parseBody(KvV1ReadResponseSchema, body, 'read');
      return { data: parsed.data, leaseDuration: parsed.lease_duration };
    }

    const query = options.version === undefined ? '' : `?version=${options.version}`;
    const body = await this.request({
      method: 'GET',
      token,
      path: `${encodePath(options.mount)}/data/${encodePath(path)}${query}`,
      notFound,
    });
    const parsed = parseBody(KvV2ReadResponseSchema, body, 'read');
    return {
      data: parsed.data.data,
      version: parsed.data.metadata?.version,
      leaseDuration: parsed.lease_duration,
    };
  }

  async list(token: string, path: string, options: ReadOptions): Promise<string[]> {
    const prefix = this.options.kvVersion === 1 ? encodePath(options.mount) : `${encodePath(options.mount)}/metadata`;
    const target = encodePath(path);
    const body = await this.request({
      method: 'GET',
      token,
      path: `${prefix}/${target}${target === '' ? '' : '/'}?list=true`,
      notFound: () => new SecretNotFoundError('secret', path),
    });
    return parseBody(ListResponseSchema, body, 'list').data.keys;
  }

  async issueCredential(token: string, role: string, options: DatabaseOptions): Promise<IssueResult> {
    const body = await this.request({
      method: 'GET',
      token,
      path: `${encodePath(options.mount)}/creds/${encodeURIComponent(role)}`,
      notFound: () => new SecretNotFoundError('role', role),
    });
    const parsed = parseBody(IssueResponseSchema, body, 'issueCredential');
    return {
      leaseId: parsed.lease_id,
      username: parsed.data.username,
      password: parsed.data.password,
      leaseDuration: parsed.lease_duration,
      renewable: parsed.renewable,
    };
  }

  async readStaticCredential(token: string, role: string, options: DatabaseOptions): Promise<StaticCredentialResult> {
    const body = await this.request({
      method: 'GET',
      token,
      path: `${encodePath(options.mount)}/static-creds/${encodeURIComponent(role)}`,
      notFound: () => new SecretNotFoundError('static role', role),
    });
    const { data } = parseBody(StaticCredentialResponseSchema, body, 'readStaticCredential');
    return {
      username: data.username,
      password: data.password,
      lastRotation: data.last_vault_rotation,
      rotationPeriod: data.rotation_period,
      ttl: data.ttl,
    };
  }

  private async request(params: {
    method: HttpRequest['method'];
    path: string;
    token?: string;
    body?: Record<string, unknown>;
    notFound: () => Error;
  }): Promise<unknown> {
    const headers: Record<string, string> = { accept: 'application/json' };
    if (params.body !== undefined) {
      headers['content-type'] = 'application/json';
    }
    if (params.token !== undefined) {
      headers['X-Vault-Token'] = params.token;
    }
    if (this.options.namespace) {
      headers['X-Vault-Namespace'] = this.options.namespace;
    }

    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method: params.method,
        url: `${this.baseUrl}/v1/${params.path}`,
        headers,
        body: params.body === undefined ? undefined : JSON.stringify(params.body),
      });
    } catch (error) {
      if (isVaultAgentError(error)) {
        throw error;
      }
      throw new StoreUnavailableError(`Request to secret store failed: ${errorMessage(error)}`, { cause: error });
    }

    if (response.status >= 200 && response.status < 300) {
      return parseJson(response.body);
    }

    const detail = describeErrors(response.body);
    if (response.status === 401 || response.status === 403) {
      throw new UnauthorizedError(detail ?? 'Permission denied', response.status);
    }
    if (response.status === 404) {
      throw params.notFound();
    }
    if (response.status >= 500) {
      throw new StoreUnavailableError(
        `Secret store returned ${response.status}${detail ? `: ${detail}` : ''}`,
        { statusCode: response.status },
      );
    }
    throw new StoreRequestError(
      `Secret store rejected request with ${response.status}${detail ? `: ${detail}` : ''}`,
      response.status,
    );
  }
}

/**
 * Encodes each segment of a slash-separated path, dropping empty segments.
 */
export function encodePath(path: string): string {
  return path
    .split('/')
    .filter(segment => segment.length > 0)
    .map(segment => encodeURIComponent(segment))
    .join('/');
}

function parseJson(body: string): unknown {
  if (body.trim() === '') {
    return {};
  }
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new StoreUnavailableError(`Secret store returned invalid JSON: ${errorMessage(error)}`, { cause: error });
  }
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, operation: string): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new StoreUnavailableError(`Unexpected ${operation} response from secret store: ${issues}`);
  }
  return result.data;
}

function describeErrors(body: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  const result = ErrorResponseSchema.safeParse(parsed);
  if (!result.success || result.data.errors.length === 0) {
    return undefined;
  }
  return result.data.errors.join('; ');
}
