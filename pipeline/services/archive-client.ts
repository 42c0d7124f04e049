import { Agent, RetryAgent, fetch as undiciFetch, type Dispatcher } from "undici";
import { z } from "zod";
import type { FetchWindow } from "../../packages/shared/src/pipeline-types.js";
import {
  ARCHIVE_UNIT_PARAMS,
  DAILY_VARIABLES,
  HOURLY_VARIABLES
} from "../constants/weather-variables.js";
import { toErrorMessage } from "../utils/errors.js";

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export interface ArchiveResponse {
  status: number;
  body?: { cancel(): Promise<void> } | null;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type ArchiveFetch = (
  url: string,
  init: { signal: AbortSignal }
) => Promise<ArchiveResponse>;

const TRANSPORT_RETRY_STATUS_CODES = [500, 502, 503, 504];

// undici raises this once RetryAgent gives up on a retryable status code.
const RETRY_EXHAUSTED_ERROR_CODE = "UND_ERR_REQ_RETRY";

export interface ArchiveDispatcherOptions {
  connections?: number;
  maxRetries?: number;
  minTimeoutMs?: number;
  /** Dispatcher the retries wrap; a keep-alive `Agent` when omitted. */
  base?: Dispatcher;
}

/**
 * Keep-alive connection pool with transport-level retries for a few 5xx
 * responses and connection resets. 429 is left to the crawl's own backoff.
 */
export const createArchiveDispatcher = (options: ArchiveDispatcherOptions = {}): Dispatcher =>
  new RetryAgent(
    options.base ??
      new Agent({
        connections: options.connections ?? 4,
        keepAliveTimeout: 30_000
      }),
    {
      maxRetries: options.maxRetries ?? 3,
      minTimeout: options.minTimeoutMs ?? 2_000,
      timeoutFactor: 2,
      methods: ["GET"],
      statusCodes: TRANSPORT_RETRY_STATUS_CODES
    }
  );

export const createPooledFetch =
  (dispatcher: Dispatcher): ArchiveFetch =>
  (url, init) =>
    undiciFetch(url, { ...init, dispatcher });

const findRetryExhaustedStatus = (error: unknown): number | null => {
  let current: unknown = error;

  for (let depth = 0; depth < 5 && current instanceof Error; depth += 1) {
    if (
      "code" in current &&
      current.code === RETRY_EXHAUSTED_ERROR_CODE &&
      "statusCode" in current &&
      typeof current.statusCode === "number"
    ) {
      return current.statusCode;
    }

    current = current.cause;
  }

  return null;
};

// ---------------------------------------------------------------------------
// Payload
// ---------------------------------------------------------------------------

export interface ArchiveSeries {
  time: string[];
  columns: Record<string, unknown[]>;
}

export interface ArchivePayload {
  hourly: ArchiveSeries;
  daily: ArchiveSeries | null;
}

// Metric arrays sit beside `time`; scalar siblings are ignored.
const seriesSchema = z
  .object({ time: z.array(z.string().nullable()) })
  .catchall(z.unknown());

const payloadSchema = z.object({
  hourly: seriesSchema,
  daily: seriesSchema.optional()
});

const toSeries = (series: z.infer<typeof seriesSchema>): ArchiveSeries => {
  const columns: Record<string, unknown[]> = {};

  for (const [metric, values] of Object.entries(series)) {
    if (metric !== "time" && Array.isArray(values)) {
      columns[metric] = values;
    }
  }

  return { time: series.time.map((entry) => entry ?? ""), columns };
};

export const parseArchivePayload = (raw: unknown): ArchivePayload => {
  const result = payloadSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid archive payload: ${issues}`);
  }

  return {
    hourly: toSeries(result.data.hourly),
    daily: result.data.daily ? toSeries(result.data.daily) : null
  };
};

// ---------------------------------------------------------------------------
// Outcome classification
// ---------------------------------------------------------------------------

export type FetchOutcome =
  | { kind: "SUCCESS"; payload: ArchivePayload }
  | { kind: "RATE_LIMITED"; status: 429 }
  | { kind: "SERVER_ERROR"; status: number }
  | { kind: "CLIENT_ERROR"; status: number; detail: string }
  | { kind: "NETWORK_ERROR"; message: string };

const SERVER_ERROR_STATUSES = new Set(TRANSPORT_RETRY_STATUS_CODES);

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface ArchiveClientOptions {
  baseUrl: string;
  timeZone: string;
  timeoutMs: number;
  fetchImpl?: ArchiveFetch;
  dispatcher?: Dispatcher;
}

/**
 * Requests one bounded window from the Open-Meteo archive and classifies the
 * result. Without `fetchImpl`, requests go through a pooled undici dispatcher
 * owned by this client and released by `close()`.
 */
export class ArchiveClient {
  private readonly options: ArchiveClientOptions;

  private readonly ownedDispatcher: Dispatcher | null;

  private readonly fetchImpl: ArchiveFetch;

  constructor(options: ArchiveClientOptions) {
    this.options = options;

    if (options.fetchImpl) {
      this.ownedDispatcher = null;
      this.fetchImpl = options.fetchImpl;
    } else {
      const dispatcher = options.dispatcher ?? createArchiveDispatcher();
      this.ownedDispatcher = options.dispatcher ? null : dispatcher;
      this.fetchImpl = createPooledFetch(dispatcher);
    }
  }

  buildUrl(latitude: number, longitude: number, window: FetchWindow): string {
    const url = new URL(this.options.baseUrl);
    url.searchParams.set("latitude", String(latitude));
    url.searchParams.set("longitude", String(longitude));
    url.searchParams.set("start_date", window.start);
    url.searchParams.set("end_date", window.end);
    url.searchParams.set("hourly", Object.keys(HOURLY_VARIABLES).join(","));
    url.searchParams.set("daily", Object.keys(DAILY_VARIABLES).join(","));
    url.searchParams.set("timezone", this.options.timeZone);

    for (const [name, value] of Object.entries(ARCHIVE_UNIT_PARAMS)) {
      url.searchParams.set(name, value);
    }

    return url.toString();
  }

  async fetchWindow(
    latitude: number,
    longitude: number,
    window: FetchWindow
  ): Promise<FetchOutcome> {
    const url = this.buildUrl(latitude, longitude, window);

    let response: ArchiveResponse;
    try {
      response = await this.fetchImpl(url, {
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });
    } catch (error) {
      const exhaustedStatus = findRetryExhaustedStatus(error);
      if (exhaustedStatus !== null) {
        return { kind: "SERVER_ERROR", status: exhaustedStatus };
      }

      return { kind: "NETWORK_ERROR", message: toErrorMessage(error) };
    }

    const { status } = response;

    if (status === 200) {
      return { kind: "SUCCESS", payload: parseArchivePayload(await response.json()) };
    }

    if (status === 429) {
      await response.body?.cancel();
      return { kind: "RATE_LIMITED", status };
    }

    if (SERVER_ERROR_STATUSES.has(status)) {
      // Release the pooled socket; the body carries nothing the retry needs.
      await response.body?.cancel();
      return { kind: "SERVER_ERROR", status };
    }

    let detail = "";
    try {
      detail = (await response.text()).slice(0, 300);
    } catch (error) {
      detail = `(unreadable body: ${toErrorMessage(error)})`;
    }

    return { kind: "CLIENT_ERROR", status, detail };
  }

  async close(): Promise<void> {
    await this.ownedDispatcher?.close();
  }
}
