import Bottleneck from 'bottleneck';
import pino from 'pino';
import { z } from 'zod';
import { config } from '../../config/index.js';
import { LookupApiError, getErrorMessage } from '../../utils/errors.js';

const logger = pino({ name: 'lookup-client', level: config.LOG_LEVEL });

// --- API response types ---

const imageUrisSchema = z.object({
  normal: z.string().optional(),
});

const cardFaceSchema = z.object({
  type_line: z.string().optional(),
  colors: z.array(z.string()).nullish(),
  image_uris: imageUrisSchema.optional(),
});

export const lookupCardSchema = z.object({
  name: z.string(),
  type_line: z.string().optional(),
  colors: z.array(z.string()).nullish(),
  image_uris: imageUrisSchema.optional(),
  card_faces: z.array(cardFaceSchema).optional(),
});

const lookupSetSchema = z.object({
  code: z.string(),
  name: z.string(),
  set_type: z.string().optional(),
});

const setListSchema = z.object({
  data: z.array(lookupSetSchema),
});

export type LookupCard = z.infer<typeof lookupCardSchema>;
export type LookupCardFace = z.infer<typeof cardFaceSchema>;
export type LookupSet = z.infer<typeof lookupSetSchema>;

export type NameMatchMode = 'fuzzy' | 'exact';

export interface LookupClientOptions {
  baseUrl: string;
  userAgent: string;
  minTimeMs: number;
  timeoutMs: number;
}

export function defaultClientOptions(): LookupClientOptions {
  return {
    baseUrl: config.LOOKUP_BASE_URL,
    userAgent: config.LOOKUP_USER_AGENT,
    minTimeMs: config.LOOKUP_MIN_TIME_MS,
    timeoutMs: config.LOOKUP_TIMEOUT_MS,
  };
}

/**
 * Client for the public card database. One request at a time, spaced by
 * `minTimeMs` to stay under the API's published rate limit. A miss (404)
 * resolves to null; every other failure throws LookupApiError. Nothing is
 * retried.
 */
export class LookupClient {
  private readonly limiter: Bottleneck;

  constructor(private readonly options: LookupClientOptions = defaultClientOptions()) {
    this.limiter = new Bottleneck({ maxConcurrent: 1, minTime: options.minTimeMs });
  }

  async fetchSets(): Promise<LookupSet[]> {
    const body = await this.request('/sets', setListSchema);
    return body?.data ?? [];
  }

  getCardByNumber(setCode: string, number: string): Promise<LookupCard | null> {
    const path = `/cards/${encodeURIComponent(setCode.toLowerCase())}/${encodeURIComponent(number)}`;
    return this.request(path, lookupCardSchema);
  }

  getCardByName(name: string, mode: NameMatchMode): Promise<LookupCard | null> {
    const params = new URLSearchParams({ [mode]: name });
    return this.request(`/cards/named?${params.toString()}`, lookupCardSchema);
  }

  private async request<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T | null> {
    const url = new URL(path, this.options.baseUrl).toString();

    let res: Response;
    try {
      res = await this.limiter.schedule(() =>
        fetch(url, {
          headers: { 'User-Agent': this.options.userAgent, Accept: 'application/json' },
          signal: AbortSignal.timeout(this.options.timeoutMs),
        }),
      );
    } catch (error) {
      throw new LookupApiError(getErrorMessage(error), { url, cause: error });
    }

    if (res.status === 404) {
      logger.debug({ url }, 'Lookup miss');
      return null;
    }

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      throw new LookupApiError(`${res.status} ${res.statusText} - ${body}`, { status: res.status, url });
    }

    const parsed = schema.safeParse(await res.json());
    if (!parsed.success) {
      throw new LookupApiError(`unexpected response shape: ${parsed.error.message}`, { status: res.status, url });
    }
    return parsed.data;
  }
}

/** What the lookup service needs from a client; tests pass a fake. */
export type CardSource = Pick<LookupClient, 'fetchSets' | 'getCardByNumber' | 'getCardByName'>;
