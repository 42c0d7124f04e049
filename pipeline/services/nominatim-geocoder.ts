import { z } from "zod";
import { toErrorMessage } from "../utils/errors.js";

export type GeocodeLookupOutcome =
  | "LOOKUP_SUCCESS"
  | "HTTP_ERROR"
  | "REQUEST_FAILED"
  | "EMPTY_RESULT"
  | "INVALID_COORDINATES";

export interface GeocodeResult {
  query: string;
  outcome: GeocodeLookupOutcome;
  latitude: number | null;
  longitude: number | null;
  displayName: string | null;
  httpStatus: number | null;
  errorMessage: string | null;
}

export interface GeocodeResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type GeocodeFetch = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<GeocodeResponseLike>;

/** Resolves a region name to coordinates; consumed by the region registry. */
export interface RegionGeocoder {
  geocode(regionName: string): Promise<GeocodeResult>;
}

export interface NominatimGeocoderOptions {
  baseUrl: string;
  countryName?: string;
  countryCode?: string;
  requestDelayMs?: number;
  requestTimeoutMs?: number;
  retryAttempts?: number;
  retryBaseDelayMs?: number;
  userAgent?: string;
  fetchImpl?: GeocodeFetch;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

const shouldRetryHttpStatus = (httpStatus: number): boolean =>
  httpStatus === 408 || httpStatus === 429 || httpStatus >= 500;

const searchRowsSchema = z.array(
  z.object({
    lat: z.string().min(1),
    lon: z.string().min(1),
    display_name: z.string().optional()
  })
);

/**
 * Sequential Nominatim lookups restricted to one country. Each lookup is
 * followed by `requestDelayMs` to stay within the public usage policy.
 */
export class NominatimGeocoder implements RegionGeocoder {
  private readonly baseUrl: string;

  private readonly countryName: string;

  private readonly countryCode: string;

  private readonly requestDelayMs: number;

  private readonly requestTimeoutMs: number;

  private readonly retryAttempts: number;

  private readonly retryBaseDelayMs: number;

  private readonly userAgent: string;

  private readonly fetchImpl: GeocodeFetch;

  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: NominatimGeocoderOptions) {
    this.baseUrl = options.baseUrl;
    this.countryName = options.countryName ?? "Vietnam";
    this.countryCode = options.countryCode ?? "vn";
    this.requestDelayMs = options.requestDelayMs ?? 1200;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 15_000;
    this.retryAttempts = options.retryAttempts ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 750;
    this.userAgent =
      options.userAgent ?? "weather-archive-harvester/1.0 (purpose: province geocoding)";
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  buildSearchUrl(regionName: string): string {
    const url = new URL("/search", this.baseUrl);
    url.searchParams.set("q", `${regionName}, ${this.countryName}`);
    url.searchParams.set("format", "jsonv2");
    url.searchParams.set("countrycodes", this.countryCode);
    url.searchParams.set("limit", "1");
    return url.toString();
  }

  async geocode(regionName: string): Promise<GeocodeResult> {
    const query = `${regionName}, ${this.countryName}`;
    const request = await this.runWithRetries(this.buildSearchUrl(regionName));

    if (this.requestDelayMs > 0) {
      await this.sleep(this.requestDelayMs);
    }

    const miss = (
      outcome: GeocodeLookupOutcome,
      details: { httpStatus?: number; errorMessage?: string }
    ): GeocodeResult => ({
      query,
      outcome,
      latitude: null,
      longitude: null,
      displayName: null,
      httpStatus: details.httpStatus ?? null,
      errorMessage: details.errorMessage ?? null
    });

    if (!request.response) {
      return miss("REQUEST_FAILED", { errorMessage: request.error ?? "Unknown error" });
    }

    const { response } = request;
    if (!response.ok) {
      return miss("HTTP_ERROR", { httpStatus: response.status });
    }

    let rows: unknown;
    try {
      rows = await response.json();
    } catch (error) {
      return miss("REQUEST_FAILED", {
        errorMessage: `Invalid JSON response: ${toErrorMessage(error)}`
      });
    }

    const parsedRows = searchRowsSchema.safeParse(rows);
    const top = parsedRows.success ? parsedRows.data[0] : undefined;
    if (!top) {
      return miss("EMPTY_RESULT", {});
    }

    const latitude = Number(top.lat);
    const longitude = Number(top.lon);
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
      return miss("INVALID_COORDINATES", { errorMessage: `${top.lat},${top.lon}` });
    }

    return {
      query,
      outcome: "LOOKUP_SUCCESS",
      latitude,
      longitude,
      displayName: top.display_name ?? null,
      httpStatus: response.status,
      errorMessage: null
    };
  }

  private async runWithRetries(
    url: string
  ): Promise<{ response: GeocodeResponseLike | null; error: string | null }> {
    let lastError: string | null = null;

    for (let attemptNumber = 1; attemptNumber <= this.retryAttempts; attemptNumber += 1) {
      const backoffDelayMs = this.retryBaseDelayMs * 2 ** (attemptNumber - 1);

      try {
        const response = await this.fetchImpl(url, {
          headers: { "User-Agent": this.userAgent, Accept: "application/json" },
          signal: AbortSignal.timeout(this.requestTimeoutMs)
        });

        if (shouldRetryHttpStatus(response.status) && attemptNumber < this.retryAttempts) {
          await this.sleep(backoffDelayMs);
          continue;
        }

        return { response, error: null };
      } catch (error) {
        lastError = toErrorMessage(error);
        if (attemptNumber < this.retryAttempts) {
          await this.sleep(backoffDelayMs);
        }
      }
    }

    return { response: null, error: lastError };
  }
}
