import { z } from "zod";
import { createLogger } from "@diagkit/logger";
import type { ServiceCredentials, TelemetryService } from "./types.js";

const log = createLogger("telemetry:http");

const REQUEST_TIMEOUT_MS = 10_000;

const profileSchema = z.object({
  username: z.string(),
});

function authHeaders(credentials: ServiceCredentials): Record<string, string> {
  return {
    "x-username": credentials.username,
    "x-token": credentials.token,
  };
}

/**
 * TelemetryService over HTTP using the global fetch.
 *
 * - submit: POST the JSON payload; non-2xx responses reject.
 * - verify: GET the profile endpoint; verified when it answers with the
 *   same username.
 */
export class HttpTelemetryService implements TelemetryService {
  async submit(
    endpointUrl: string,
    credentials: ServiceCredentials,
    payload: string,
  ): Promise<void> {
    const response = await fetch(endpointUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...authHeaders(credentials),
      },
      body: payload,
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }
  }

  async verify(endpointUrl: string, credentials: ServiceCredentials): Promise<boolean> {
    const response = await fetch(endpointUrl, {
      method: "GET",
      headers: authHeaders(credentials),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (!response.ok) {
      log.info(`Login verification rejected: HTTP ${response.status}`);
      return false;
    }

    const body: unknown = await response.json();
    const profile = profileSchema.safeParse(body);
    if (!profile.success) {
      log.warn("Login verification returned an unexpected body");
      return false;
    }
    return profile.data.username === credentials.username;
  }
}
