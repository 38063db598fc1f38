// Remote telemetry service base domain
export const API_BASE_URL = "https://api.diagkit.dev";

export const TELEMETRY_PATH = "/telemetry";
export const VERIFY_PATH = "/profile";

/** Return the telemetry submission endpoint for the given base URL. */
export function getTelemetryUrl(baseUrl: string = API_BASE_URL): string {
	return `${baseUrl}${TELEMETRY_PATH}`;
}

/** Return the login verification endpoint for the given base URL. */
export function getVerifyUrl(baseUrl: string = API_BASE_URL): string {
	return `${baseUrl}${VERIFY_PATH}`;
}
