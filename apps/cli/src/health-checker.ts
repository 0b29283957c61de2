import type { Config } from "@stackctl/config";
import { log, logWarning } from "./logger.js";

export interface HealthCheckConfig {
  url: string;
  service: string;
}

export interface HealthCheckResult {
  service: string;
  url: string;
  healthy: boolean;
  error?: string;
}

export type FetchFn = typeof fetch;

/**
 * Perform a single unauthenticated GET. Never throws: a failure is a result.
 */
export async function performHealthCheck(
  check: HealthCheckConfig,
  fetchFn: FetchFn = fetch
): Promise<HealthCheckResult> {
  try {
    const response = await fetchFn(check.url, { method: "GET" });

    if (!response.ok) {
      return { ...check, healthy: false, error: `HTTP ${response.status}` };
    }

    return { ...check, healthy: true };
  } catch (error) {
    return {
      ...check,
      healthy: false,
      error: error instanceof Error ? error.message : "Unknown error",
    };
  }
}

/**
 * Probes both endpoints side by side. Each outcome is reported on its own;
 * one failing probe never cancels or hides the other.
 */
export async function checkAll(
  checks: readonly HealthCheckConfig[],
  fetchFn: FetchFn = fetch
): Promise<HealthCheckResult[]> {
  const results = await Promise.all(checks.map((check) => performHealthCheck(check, fetchFn)));

  for (const result of results) {
    if (result.healthy) {
      log.health.info({ url: result.url }, `${result.service} healthy`);
    } else {
      logWarning("health", `${result.service} health check failed`, {
        url: result.url,
        error: result.error,
      });
    }
  }

  return results;
}

export function healthChecks(config: Config): HealthCheckConfig[] {
  return [
    { service: "Gateway", url: config.GATEWAY_HEALTH_URL },
    { service: "Backend", url: config.BACKEND_HEALTH_URL },
  ];
}
