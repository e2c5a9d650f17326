import axios, { AxiosInstance } from 'axios';
import http from 'http';
import config from '../config/index.js';
import { encodeCommand, OasisCommand, toQueryParams } from '../codec/commands.js';
import type { OasisDevice } from '../device/device.js';
import { errorMessage, getLogger } from '../utils/logger.js';
import { CommandTransport } from './command-transport.js';

const log = getLogger('http-client');

export interface OasisHttpClientOptions {
  host: string;
  /** Shared axios instance. When omitted the client creates and owns one. */
  http?: AxiosInstance;
  timeout?: number;
}

/**
 * Local-network transport for a single device. Every command is a
 * `GET http://<host>/?KEY=value` request.
 */
export class OasisHttpClient extends CommandTransport {
  readonly host: string;
  private instance: AxiosInstance | null;
  private readonly ownsInstance: boolean;
  private agent: http.Agent | null = null;
  private readonly timeout: number;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: OasisHttpClientOptions) {
    super();
    this.host = options.host;
    this.instance = options.http ?? null;
    this.ownsInstance = !options.http;
    this.timeout = options.timeout ?? config.http.timeout;
  }

  get url(): string {
    return `http://${this.host}/`;
  }

  private client(): AxiosInstance {
    if (!this.instance) {
      this.agent = new http.Agent({ keepAlive: true });
      this.instance = axios.create({ timeout: this.timeout, httpAgent: this.agent });
    }
    return this.instance;
  }

  /**
   * Sends raw query parameters. Resolves with the decoded body: parsed JSON,
   * plain text, or `null` for any other content type or a non-200 success.
   */
  sendCommand(params: Record<string, string>): Promise<unknown> {
    return this.serialize(() => this.request(params));
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async request(params: Record<string, string>): Promise<unknown> {
    const client = this.client();
    log.debug(`GET ${client.getUri({ url: this.url, params })}`);

    const response = await client.get<unknown>(this.url, {
      params,
      responseType: 'text',
      transformResponse: (data: unknown) => data,
    });

    if (response.status !== 200) return null;

    const contentType = String(response.headers['content-type'] ?? '');
    const body = typeof response.data === 'string' ? response.data : '';
    if (contentType.startsWith('application/json')) {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    }
    if (contentType.startsWith('text/plain')) {
      return body;
    }
    return null;
  }

  protected async dispatch(_device: OasisDevice, command: OasisCommand): Promise<void> {
    await this.sendCommand(toQueryParams(encodeCommand(command)));
  }

  async getStatus(device: OasisDevice): Promise<void> {
    const raw = await this.sendCommand(toQueryParams(encodeCommand({ type: 'getStatus' })));
    if (typeof raw !== 'string') {
      log.warn(`Unexpected status response from ${this.host}`);
      return;
    }
    device.applyStatusString(raw);
  }

  async getMacAddress(_device: OasisDevice): Promise<string | null> {
    try {
      const mac = await this.sendCommand(toQueryParams(encodeCommand({ type: 'getMac' })));
      return typeof mac === 'string' ? mac.trim() : null;
    } catch (error) {
      log.warn(`Failed to get MAC address from ${this.host}: ${errorMessage(error)}`);
      return null;
    }
  }

  async close(): Promise<void> {
    if (!this.ownsInstance) return;
    this.agent?.destroy();
    this.agent = null;
    this.instance = null;
  }
}
