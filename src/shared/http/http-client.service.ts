import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { Agent, Dispatcher, Pool } from 'undici';
import { PinoLoggerService } from '../logging/pino-logger.service';
import { Readable } from 'stream';

export interface HttpRequestOptions {
  method?: Dispatcher.HttpMethod;
  headers?: Record<string, string>;
  body?: string | Buffer;
  /** Header and body timeout in ms; `0` disables both. */
  timeout?: number;
}

export interface DownloadOptions {
  /** Header and body timeout in ms; `0` disables both. */
  timeout?: number;
  maxRedirections?: number;
}

export interface HttpResponse<T = unknown> {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: T;
}

export interface StreamResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: Readable;
}

@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly pools: Map<string, Pool> = new Map();
  private readonly logger: PinoLoggerService;
  private readonly defaultTimeout = 30000;
  private readonly defaultMaxRedirections = 5;

  constructor(logger: PinoLoggerService) {
    this.logger = logger.forContext(HttpClientService.name);
  }

  private getPool(baseUrl: string): Pool {
    let pool = this.pools.get(baseUrl);
    if (!pool) {
      pool = new Pool(baseUrl, {
        connections: 10,
        pipelining: 1,
        keepAliveTimeout: 30000,
        keepAliveMaxTimeout: 60000,
      });
      this.pools.set(baseUrl, pool);
    }
    return pool;
  }

  /**
   * Single attempt against a pooled origin. The body is read fully and
   * parsed as JSON when possible.
   */
  async request<T = unknown>(
    url: string,
    options: HttpRequestOptions = {},
  ): Promise<HttpResponse<T | string>> {
    const parsedUrl = new URL(url);
    const pool = this.getPool(parsedUrl.origin);
    const timeout = options.timeout ?? this.defaultTimeout;

    try {
      const response = await pool.request({
        path: parsedUrl.pathname + parsedUrl.search,
        method: options.method || 'GET',
        headers: options.headers,
        body: options.body,
        headersTimeout: timeout,
        bodyTimeout: timeout,
      });

      const bodyText = await response.body.text();
      let body: T | string;

      try {
        body = JSON.parse(bodyText);
      } catch {
        body = bodyText;
      }

      return {
        statusCode: response.statusCode,
        headers: response.headers,
        body,
      };
    } catch (error) {
      this.logger.warn(
        { url, error: error instanceof Error ? error.message : String(error) },
        'HTTP request failed',
      );
      throw error;
    }
  }

  /**
   * POST an `application/x-www-form-urlencoded` body built from `fields`.
   */
  async postForm<T = unknown>(
    url: string,
    fields: Record<string, string>,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse<T | string>> {
    return this.request<T>(url, {
      ...options,
      method: 'POST',
      body: new URLSearchParams(fields).toString(),
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        ...options?.headers,
      },
    });
  }

  /**
   * Single GET, following redirects, whose body is handed back unread. The
   * caller owns the stream and must consume or destroy it.
   *
   * Each download gets its own agent, destroyed once the body closes, so no
   * connection to a user-supplied host outlives its download.
   */
  async downloadToStream(url: string, options: DownloadOptions = {}): Promise<StreamResponse> {
    const parsedUrl = new URL(url);
    const timeout = options.timeout ?? this.defaultTimeout;
    const agent = new Agent({
      maxRedirections: options.maxRedirections ?? this.defaultMaxRedirections,
    });

    const response = await agent
      .request({
        origin: parsedUrl.origin,
        path: parsedUrl.pathname + parsedUrl.search,
        method: 'GET',
        headersTimeout: timeout,
        bodyTimeout: timeout,
      })
      .catch(async (error: unknown) => {
        await agent.destroy();
        throw error;
      });

    response.body.once('close', () => {
      agent.destroy().catch((error: unknown) => {
        this.logger.warn(
          { url, error: error instanceof Error ? error.message : String(error) },
          'Failed to release download agent',
        );
      });
    });

    return {
      statusCode: response.statusCode,
      headers: response.headers,
      body: response.body,
    };
  }

  async destroy(): Promise<void> {
    const closePromises = Array.from(this.pools.values()).map((pool) => pool.close());
    await Promise.all(closePromises);
    this.pools.clear();
  }

  async onModuleDestroy(): Promise<void> {
    await this.destroy();
  }
}
