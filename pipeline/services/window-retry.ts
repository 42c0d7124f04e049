import type { FetchWindow, Region } from "../../packages/shared/src/pipeline-types.js";
import type { ArchiveClient, FetchOutcome } from "./archive-client.js";
import { reshapeArchivePayload, type ObservationFragment } from "./response-reshaper.js";

export interface RetryPolicy {
  maxAttempts: number;
  networkBackoffSeconds: number;
  serverBackoffSeconds: number;
  rateLimitBackoffSeconds: number;
  rateLimitJitterSeconds: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 6,
  networkBackoffSeconds: 10,
  serverBackoffSeconds: 20,
  rateLimitBackoffSeconds: 60,
  rateLimitJitterSeconds: 60
};

export type WindowFetcher = Pick<ArchiveClient, "fetchWindow">;

export type WindowResult =
  | { kind: "SUCCEEDED"; fragment: ObservationFragment; attempts: number }
  | { kind: "SOFT_FAILED"; status: number; detail: string; attempts: number }
  | { kind: "HARD_STOPPED"; attempts: number; lastFailure: string };

export interface WindowRetryOptions {
  policy?: Partial<RetryPolicy>;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  log?: (message: string) => void;
}

type RetryableOutcome = Extract<
  FetchOutcome,
  { kind: "NETWORK_ERROR" | "RATE_LIMITED" | "SERVER_ERROR" }
>;

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Wait before attempt `attempt + 1`. Linear in the attempt number; 429s add a
 * whole-second jitter in `[0, rateLimitJitterSeconds]`.
 */
export const computeBackoffSeconds = (
  outcome: RetryableOutcome,
  attempt: number,
  policy: RetryPolicy,
  random: () => number
): number => {
  switch (outcome.kind) {
    case "NETWORK_ERROR":
      return policy.networkBackoffSeconds * attempt;
    case "SERVER_ERROR":
      return policy.serverBackoffSeconds * attempt;
    case "RATE_LIMITED":
      return (
        policy.rateLimitBackoffSeconds * attempt +
        Math.floor(random() * (policy.rateLimitJitterSeconds + 1))
      );
  }
};

const describeFailure = (outcome: RetryableOutcome): string => {
  switch (outcome.kind) {
    case "NETWORK_ERROR":
      return `connection error: ${outcome.message}`;
    case "SERVER_ERROR":
      return `server error ${outcome.status}`;
    case "RATE_LIMITED":
      return "429 rate limited";
  }
};

/**
 * Fetches one window, retrying throttling, server and connection failures
 * with backoff. Other non-200 statuses drop the window. Exhausting every
 * attempt yields HARD_STOPPED, which callers must persist before ending the
 * run.
 */
export const fetchWindowWithRetry = async (
  client: WindowFetcher,
  region: Region,
  window: FetchWindow,
  options: WindowRetryOptions = {}
): Promise<WindowResult> => {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  const log = options.log ?? console.log;

  let lastFailure = "no attempt made";

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt += 1) {
    const outcome = await client.fetchWindow(region.latitude, region.longitude, window);

    if (outcome.kind === "SUCCESS") {
      return {
        kind: "SUCCEEDED",
        fragment: reshapeArchivePayload(outcome.payload, region.name),
        attempts: attempt
      };
    }

    if (outcome.kind === "CLIENT_ERROR") {
      log(
        `    ✖ API error ${outcome.status} for window ${window.start} → ${window.end}, skipping window.`
      );
      return {
        kind: "SOFT_FAILED",
        status: outcome.status,
        detail: outcome.detail,
        attempts: attempt
      };
    }

    lastFailure = describeFailure(outcome);
    const waitSeconds = computeBackoffSeconds(outcome, attempt, policy, random);
    log(
      `    ⚠ ${lastFailure} (attempt ${attempt}/${policy.maxAttempts}) – waiting ${waitSeconds}s before retrying...`
    );
    await wait(waitSeconds * 1000);
  }

  log(
    `    ✖ ${policy.maxAttempts} attempts failed (${lastFailure}). Hard stop at window ${window.start} → ${window.end}.`
  );

  return { kind: "HARD_STOPPED", attempts: policy.maxAttempts, lastFailure };
};
