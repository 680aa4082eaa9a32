import { z } from 'zod';
import { logger, describeError } from '../logger';
import { ANIMATED_RETRIES, FETCH_TIMEOUT_MS } from '../constants';

export interface ImageEndpoint {
  name: string;
  url: string;
  /** Pulls a candidate image URL out of the decoded JSON body. */
  parse(body: unknown): string | null;
  /** When set, only URLs with one of these extensions are accepted and the endpoint is retried. */
  animatedExtensions?: readonly string[];
}

export type FetchLike = (url: string, init: { signal: AbortSignal; headers: Record<string, string> }) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;

export interface ImageFetcherOptions {
  endpoints?: readonly ImageEndpoint[];
  fetch?: FetchLike;
  shuffle?: <T>(items: readonly T[]) => T[];
  timeoutMs?: number;
  animatedRetries?: number;
}

const foxSchema = z.object({ image: z.string().url() });
const catSchema = z.array(z.object({ url: z.string().url() })).min(1);
const dogSchema = z.object({ url: z.string().url() });

export const DEFAULT_ENDPOINTS: readonly ImageEndpoint[] = [
  {
    name: 'randomfox',
    url: 'https://randomfox.ca/floof/',
    parse: (body) => {
      const r = foxSchema.safeParse(body);
      return r.success ? r.data.image : null;
    },
  },
  {
    name: 'thecatapi',
    url: 'https://api.thecatapi.com/v1/images/search?mime_types=gif',
    parse: (body) => {
      const r = catSchema.safeParse(body);
      return r.success ? r.data[0].url : null;
    },
  },
  {
    name: 'randomdog',
    url: 'https://random.dog/woof.json',
    parse: (body) => {
      const r = dogSchema.safeParse(body);
      return r.success ? r.data.url : null;
    },
    animatedExtensions: ['.gif', '.mp4', '.webm'],
  },
];

export function shuffle<T>(items: readonly T[]): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(Math.random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

export function hasExtension(url: string, extensions: readonly string[]): boolean {
  let pathname: string;
  try {
    pathname = new URL(url).pathname.toLowerCase();
  } catch {
    return false;
  }
  return extensions.some((ext) => pathname.endsWith(ext));
}

export class ImageFetcher {
  private readonly endpoints: readonly ImageEndpoint[];
  private readonly fetchImpl: FetchLike;
  private readonly shuffle: <T>(items: readonly T[]) => T[];
  private readonly timeoutMs: number;
  private readonly animatedRetries: number;

  constructor(options: ImageFetcherOptions = {}) {
    this.endpoints = options.endpoints ?? DEFAULT_ENDPOINTS;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.shuffle = options.shuffle ?? shuffle;
    this.timeoutMs = options.timeoutMs ?? FETCH_TIMEOUT_MS;
    this.animatedRetries = options.animatedRetries ?? ANIMATED_RETRIES;
  }

  /** One request; null on timeout, non-2xx or an unusable body. */
  private async request(endpoint: ImageEndpoint): Promise<string | null> {
    try {
      const response = await this.fetchImpl(endpoint.url, {
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: { Accept: 'application/json' },
      });
      if (!response.ok) {
        logger.warn('Image endpoint returned an error status', { endpoint: endpoint.name, status: response.status });
        return null;
      }
      const url = endpoint.parse(await response.json());
      if (!url) {
        logger.warn('Image endpoint returned an unexpected body', { endpoint: endpoint.name });
      }
      return url;
    } catch (e) {
      logger.warn('Image endpoint request failed', { endpoint: endpoint.name, error: describeError(e) });
      return null;
    }
  }

  private async tryEndpoint(endpoint: ImageEndpoint): Promise<string | null> {
    const extensions = endpoint.animatedExtensions;
    if (!extensions) {
      return this.request(endpoint);
    }

    for (let attempt = 1; attempt <= this.animatedRetries; attempt++) {
      const url = await this.request(endpoint);
      if (url && hasExtension(url, extensions)) return url;
      if (url) {
        logger.info('Skipping non-animated image', { endpoint: endpoint.name, attempt, url });
      }
    }
    return null;
  }

  async fetchRandomImage(): Promise<string | null> {
    for (const endpoint of this.shuffle(this.endpoints)) {
      const url = await this.tryEndpoint(endpoint);
      if (url) {
        logger.info('Fetched random image', { endpoint: endpoint.name, url });
        return url;
      }
    }
    logger.warn('All image endpoints failed', { endpoints: this.endpoints.map((e) => e.name) });
    return null;
  }
}
