import { z } from 'zod';
import loggerModule, { type Logger } from '../logger.js';
import type { GeoLocation } from '../types.js';

export interface Geolocator {
  locate(ip: string, signal?: AbortSignal): Promise<GeoLocation>;
}

export const LOCAL_LOCATION: GeoLocation = { city: 'Local', country: 'Local', lat: 0, lon: 0 };
export const UNKNOWN_LOCATION: GeoLocation = { city: 'Unknown', country: 'Unknown', lat: 0, lon: 0 };

const PRIVATE_IPV4 = [/^10\./, /^127\./, /^192\.168\./, /^172\.(1[6-9]|2\d|3[01])\./, /^169\.254\./];

export function isLocalAddress(ip: string): boolean {
  const value = ip.trim().toLowerCase().replace(/^::ffff:/, '');
  if (value === '' || value === 'localhost' || value === 'unknown' || value === '::1') {
    return true;
  }
  if (value.startsWith('fc') || value.startsWith('fd') || value.startsWith('fe80:')) {
    return true;
  }
  return PRIVATE_IPV4.some(pattern => pattern.test(value));
}

// ip-api.com style payload; only the fields we surface.
const lookupSchema = z.object({
  city: z.string().optional(),
  country: z.string().optional(),
  lat: z.number().optional(),
  lon: z.number().optional()
});

export interface HttpGeolocatorOptions {
  /** URL template; `{ip}` is replaced with the encoded address. */
  endpoint?: string;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

/** Best effort: local addresses resolve to Local, every failure to Unknown. */
export class HttpGeolocator implements Geolocator {
  private readonly endpoint: string | null;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: HttpGeolocatorOptions = {}) {
    const endpoint = options.endpoint?.trim();
    this.endpoint = endpoint ? endpoint : null;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? loggerModule;
  }

  async locate(ip: string, signal?: AbortSignal): Promise<GeoLocation> {
    if (isLocalAddress(ip)) {
      return { ...LOCAL_LOCATION };
    }
    if (!this.endpoint) {
      return { ...UNKNOWN_LOCATION };
    }

    const url = this.endpoint.includes('{ip}')
      ? this.endpoint.replace('{ip}', encodeURIComponent(ip))
      : `${this.endpoint.replace(/\/+$/, '')}/${encodeURIComponent(ip)}`;
    try {
      const response = await this.fetchImpl(url, { signal });
      if (!response.ok) {
        throw new Error(`geolocation endpoint returned ${response.status}`);
      }
      const body = lookupSchema.parse(await response.json());
      return {
        city: body.city || UNKNOWN_LOCATION.city,
        country: body.country || UNKNOWN_LOCATION.country,
        lat: body.lat ?? 0,
        lon: body.lon ?? 0
      };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.logger.warn({ err: error, ip }, 'IP geolocation failed');
      return { ...UNKNOWN_LOCATION };
    }
  }
}
