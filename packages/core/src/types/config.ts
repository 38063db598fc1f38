import { z } from "zod";
import { getTelemetryUrl, getVerifyUrl } from "../endpoints.js";

export const telemetrySettingsSchema = z.object({
  enableTelemetry: z.boolean().default(true),
  telemetryEndpointUrl: z.string().url().default(getTelemetryUrl()),
  verifyEndpointUrl: z.string().url().default(getVerifyUrl()),
  username: z.string().default(""),
  token: z.string().default(""),
  /** Index of the selected CPU emulation core. */
  cpuCore: z.number().int().min(0).default(0),
  resolutionFactor: z.number().positive().default(1),
  toggleFramelimit: z.boolean().default(true),
});

export type TelemetrySettings = z.infer<typeof telemetrySettingsSchema>;

/** Credentials the remote telemetry service authenticates with. */
export interface RemoteCredentials {
  username: string;
  token: string;
}
