import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse, isAxiosError } from 'axios';
import { z } from 'zod';
import config from '../config/index.js';
import { unknownTrackName } from '../constants.js';
import { UnauthenticatedError } from '../errors.js';
import {
  CloudDevice,
  PlaylistInfo,
  SoftwareDetails,
  TrackInfo,
  TrackMetadataSource,
} from '../types/device.js';
import { errorMessage, getLogger } from '../utils/logger.js';
import { MetadataCache } from './metadata-cache.js';

const log = getLogger('cloud-client');

const PLAYLISTS_TTL_MS = 5 * 60 * 1000;
const TRACK_TTL_MS = 60 * 60 * 1000;
const SOFTWARE_TTL_MS = 60 * 60 * 1000;

const trackSchema = z
  .object({
    id: z.number().int(),
    name: z.string().optional(),
    image: z.string().nullish(),
    reduced_svg_content_new: z.number().nullish(),
  })
  .passthrough();

const playlistSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    patterns: z.array(trackSchema).default([]),
  })
  .passthrough();

const trackPageSchema = z.object({
  data: z.array(trackSchema).default([]),
  next_page_url: z.string().nullish(),
});

const softwareSchema = z.object({ version: z.string() }).passthrough();

// model arrives either as a plain name or as a nested record
const deviceSchema = z
  .object({
    serial_number: z.string(),
    name: z.string().nullish(),
    model: z
      .union([z.string(), z.object({ name: z.string().nullish() }).passthrough()])
      .nullish()
      .transform((model) => (typeof model === 'object' && model !== null ? model.name ?? null : model ?? null)),
  })
  .passthrough();

const loginSchema = z.object({ access_token: z.string() });

export interface OasisCloudClientOptions {
  /** Shared axios instance. When omitted the client creates and owns one. */
  http?: AxiosInstance;
  accessToken?: string | null;
  baseUrl?: string;
  timeout?: number;
  now?: () => number;
}

export function getTrackIdsFromPlaylist(playlist: PlaylistInfo): number[] {
  return playlist.patterns.map((track) => track.id);
}

/**
 * REST client for the vendor cloud: account, device listing, playlists,
 * track metadata and firmware versions.
 */
export class OasisCloudClient implements TrackMetadataSource {
  readonly baseUrl: string;
  accessToken: string | null;

  private instance: AxiosInstance | null;
  private readonly ownsInstance: boolean;
  private readonly timeout: number;

  private readonly playlists: MetadataCache<PlaylistInfo[]>;
  private readonly tracks: MetadataCache<TrackInfo>;
  private readonly software: MetadataCache<SoftwareDetails>;

  constructor(options: OasisCloudClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.cloud.baseUrl).replace(/\/+$/, '');
    this.accessToken = options.accessToken ?? config.cloud.accessToken ?? null;
    this.instance = options.http ?? null;
    this.ownsInstance = !options.http;
    this.timeout = options.timeout ?? config.cloud.timeout;

    this.playlists = new MetadataCache({ defaultTtlMs: PLAYLISTS_TTL_MS, now: options.now });
    this.tracks = new MetadataCache({ defaultTtlMs: TRACK_TTL_MS, now: options.now });
    this.software = new MetadataCache({ defaultTtlMs: SOFTWARE_TTL_MS, now: options.now });
  }

  private client(): AxiosInstance {
    if (!this.instance) {
      this.instance = axios.create({
        headers: { Accept: 'application/json' },
        timeout: this.timeout,
      });
    }
    return this.instance;
  }

  async close(): Promise<void> {
    if (this.ownsInstance) {
      this.instance = null;
    }
  }

  // ============ Account ============

  async login(email: string, password: string): Promise<void> {
    const response = await this.request({
      method: 'POST',
      url: 'api/auth/login',
      data: { email, password },
    });
    const parsed = loginSchema.safeParse(response);
    this.accessToken = parsed.success ? parsed.data.access_token : null;
    log.debug(`Cloud login succeeded, token set: ${Boolean(this.accessToken)}`);
  }

  async logout(): Promise<void> {
    await this.authRequest({ method: 'GET', url: 'api/auth/logout' });
    this.accessToken = null;
    this.playlists.invalidate();
  }

  async getUser(): Promise<Record<string, unknown>> {
    return z.record(z.unknown()).parse(await this.authRequest({ method: 'GET', url: 'api/auth/user' }));
  }

  async getDevices(): Promise<CloudDevice[]> {
    const response = await this.authRequest({ method: 'GET', url: 'api/user/devices' });
    return z.array(deviceSchema).parse(response ?? []);
  }

  // ============ Content ============

  async getPlaylists(personalOnly = false): Promise<PlaylistInfo[]> {
    return this.playlists.get(personalOnly ? 'personal' : 'all', async () => {
      const response = await this.authRequest({
        method: 'GET',
        url: 'api/playlist',
        params: { my_playlists: String(personalOnly) },
      });
      return z.array(playlistSchema).parse(response ?? []);
    });
  }

  /**
   * Metadata for one track. A track the cloud does not know becomes a
   * placeholder record; other failures are logged and give `null`.
   */
  async getTrackInfo(trackId: number): Promise<TrackInfo | null> {
    try {
      return await this.tracks.get(String(trackId), async () => {
        try {
          return trackSchema.parse(await this.authRequest({ method: 'GET', url: `api/track/${trackId}` }));
        } catch (error) {
          if (isAxiosError(error) && error.response?.status === 404) {
            return { id: trackId, name: unknownTrackName(trackId) };
          }
          throw error;
        }
      });
    } catch (error) {
      if (error instanceof UnauthenticatedError) throw error;
      log.error(`Error fetching track ${trackId}`, { error: errorMessage(error) });
      return null;
    }
  }

  /** Metadata for several tracks, following `next_page_url` to the end. */
  async getTracks(ids: readonly number[] = []): Promise<TrackInfo[]> {
    const first = await this.authRequest({ method: 'GET', url: 'api/track', params: { ids } });
    if (!first) return [];

    let page = trackPageSchema.parse(first);
    const tracks: TrackInfo[] = [...page.data];
    while (page.next_page_url) {
      page = trackPageSchema.parse(await this.authRequest({ method: 'GET', url: page.next_page_url }));
      tracks.push(...page.data);
    }
    return tracks;
  }

  async getLatestSoftwareDetails(): Promise<SoftwareDetails> {
    return this.software.get('latest', async () =>
      softwareSchema.parse(await this.authRequest({ method: 'GET', url: 'api/software/last-version' }))
    );
  }

  // ============ Transport ============

  private async authRequest(request: AxiosRequestConfig): Promise<unknown> {
    if (!this.accessToken) {
      throw new UnauthenticatedError();
    }
    return this.request({
      ...request,
      headers: { Authorization: `Bearer ${this.accessToken}` },
    });
  }

  private async request(request: AxiosRequestConfig): Promise<unknown> {
    const client = this.client();
    const withDefaults: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      responseType: 'text',
      transformResponse: (data: unknown) => data,
      ...request,
    };
    const url = client.getUri(withDefaults);
    log.debug(`${(request.method ?? 'GET').toUpperCase()} ${url}`);

    let response: AxiosResponse<unknown>;
    try {
      response = await client.request<unknown>(withDefaults);
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 401) {
        throw new UnauthenticatedError();
      }
      throw error;
    }

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
    if (contentType.startsWith('text/html') && url.startsWith(this.baseUrl) && body.includes('login-page')) {
      throw new UnauthenticatedError();
    }
    return null;
  }
}
