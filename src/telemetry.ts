/**
 * Anonymous usage counters.
 *
 * Fire-and-forget: track() returns immediately, the request runs detached
 * with a short timeout, and any failure is dropped. Only aggregate numbers
 * are sent; never query text or agent names.
 *
 * Opt-out:
 *   AGENT_REGISTRY_NO_TELEMETRY=1
 *   DO_NOT_TRACK=1
 * Disabled automatically when a CI indicator variable is set.
 */

export const TELEMETRY_ENDPOINT = "https://t.insightx.pro";
export const TELEMETRY_TIMEOUT_MS = 2000;
export const TOOL_ID = "agent-registry";
export const VERSION = "1.0.0";

const OPT_OUT_VARS = ["AGENT_REGISTRY_NO_TELEMETRY", "DO_NOT_TRACK"];
const CI_VARS = ["CI", "GITHUB_ACTIONS", "GITLAB_CI", "CIRCLECI", "TRAVIS", "BUILDKITE", "JENKINS_URL"];

export type TelemetryEvent = "search" | "get" | "list" | "rebuild" | "ingest";
export type TelemetryData = Record<string, number | boolean | string>;

export interface TelemetrySink {
  track(event: TelemetryEvent, data?: TelemetryData): void;
}

type Env = Record<string, string | undefined>;
type FetchLike = (url: string, init: { headers: Record<string, string>; signal: AbortSignal }) => Promise<unknown>;

export function isTelemetryDisabled(env: Env = process.env): boolean {
  return [...OPT_OUT_VARS, ...CI_VARS].some((name) => Boolean(env[name]));
}

export function buildTelemetryUrl(endpoint: string, event: TelemetryEvent, data: TelemetryData = {}): string {
  const params = new URLSearchParams({
    t: TOOL_ID,
    e: event,
    v: VERSION,
    node: process.versions.node,
    os: process.platform,
  });
  for (const [key, value] of Object.entries(data)) {
    params.set(key, String(value));
  }
  return `${endpoint}?${params.toString()}`;
}

export interface TelemetryOptions {
  env?: Env;
  endpoint?: string;
  fetch?: FetchLike;
  timeout_ms?: number;
}

export function createTelemetry(options: TelemetryOptions = {}): TelemetrySink {
  const env = options.env ?? process.env;
  const disabled = isTelemetryDisabled(env);
  const endpoint = options.endpoint ?? env.AGENT_REGISTRY_TELEMETRY_URL ?? TELEMETRY_ENDPOINT;
  const doFetch: FetchLike = options.fetch ?? ((url, init) => fetch(url, init));
  const timeout = options.timeout_ms ?? TELEMETRY_TIMEOUT_MS;

  async function send(url: string): Promise<void> {
    try {
      await doFetch(url, {
        headers: { "User-Agent": `${TOOL_ID}/${VERSION}` },
        signal: AbortSignal.timeout(timeout),
      });
    } catch (err) {
      // Telemetry never reaches the caller.
      if (env.AGENT_REGISTRY_DEBUG) {
        console.error(`[agent-registry] telemetry dropped: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  return {
    track(event, data) {
      if (disabled) return;
      void send(buildTelemetryUrl(endpoint, event, data));
    },
  };
}
