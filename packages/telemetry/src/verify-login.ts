import { setImmediate as yieldToLoop } from "node:timers/promises";
import { createLogger } from "@diagkit/logger";
import type { TelemetryService } from "./types.js";

const log = createLogger("telemetry:verify");

export interface VerifyLoginOptions {
  /** Remote verification capability; without it nothing is contacted */
  service?: TelemetryService;
  endpointUrl: string;
}

/**
 * Check a username/token pair against the verification endpoint.
 *
 * The check starts on a later turn of the event loop, never inside the
 * caller's. `onComplete` runs exactly once, right before the returned
 * promise settles, whatever the outcome. Errors resolve to `false`.
 */
export async function verifyLogin(
  username: string,
  token: string,
  onComplete: () => void,
  options: VerifyLoginOptions,
): Promise<boolean> {
  await yieldToLoop();

  let verified = false;
  try {
    if (options.service) {
      verified = await options.service.verify(options.endpointUrl, { username, token });
    }
  } catch (error) {
    log.error(`Login verification failed: ${describeError(error)}`);
    verified = false;
  } finally {
    try {
      onComplete();
    } catch (error) {
      log.error(`Login verification callback threw: ${describeError(error)}`);
    }
  }
  return verified;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
