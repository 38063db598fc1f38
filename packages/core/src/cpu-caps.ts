import { readFileSync } from "node:fs";
import { cpus } from "node:os";
import { createLogger } from "@diagkit/logger";
import type { CpuCaps, CpuFeatures, CpuVendor } from "./types/build-info.js";

const log = createLogger("cpu-caps");

/** Feature key -> flag name as it appears in /proc/cpuinfo. */
const CPUINFO_FLAGS: Record<keyof CpuFeatures, string> = {
  aes: "aes",
  avx: "avx",
  avx2: "avx2",
  bmi1: "bmi1",
  bmi2: "bmi2",
  fma: "fma",
  fma4: "fma4",
  sse: "sse",
  sse2: "sse2",
  sse3: "pni",
  ssse3: "ssse3",
  sse4_1: "sse4_1",
  sse4_2: "sse4_2",
};

export function classifyCpuVendor(vendorId: string): CpuVendor {
  switch (vendorId.trim()) {
    case "GenuineIntel":
      return "Intel";
    case "AuthenticAMD":
      return "Amd";
    default:
      return "Other";
  }
}

/**
 * Parse the first processor block of a Linux /proc/cpuinfo dump.
 */
export function parseCpuInfo(text: string): CpuCaps {
  const entries = new Map<string, string>();
  for (const line of text.split("\n")) {
    if (line.trim() === "") {
      if (entries.size > 0) break;
      continue;
    }
    const sep = line.indexOf(":");
    if (sep === -1) continue;
    entries.set(line.slice(0, sep).trim(), line.slice(sep + 1).trim());
  }

  const cpuString = entries.get("vendor_id") ?? "";
  const flags = new Set((entries.get("flags") ?? "").split(/\s+/).filter(Boolean));

  const has = (key: keyof CpuFeatures): boolean => flags.has(CPUINFO_FLAGS[key]);

  return {
    cpuString,
    brandString: entries.get("model name") ?? "",
    vendor: classifyCpuVendor(cpuString),
    features: {
      aes: has("aes"),
      avx: has("avx"),
      avx2: has("avx2"),
      bmi1: has("bmi1"),
      bmi2: has("bmi2"),
      fma: has("fma"),
      fma4: has("fma4"),
      sse: has("sse"),
      sse2: has("sse2"),
      sse3: has("sse3"),
      ssse3: has("ssse3"),
      sse4_1: has("sse4_1"),
      sse4_2: has("sse4_2"),
    },
  };
}

/**
 * Detect the host CPU. Linux reads /proc/cpuinfo; elsewhere every feature
 * reports false. The model name from os.cpus() fills in whenever
 * /proc/cpuinfo has none, as on non-x86 hosts.
 */
export function detectCpuCaps(): CpuCaps {
  let caps = parseCpuInfo("");
  if (process.platform === "linux") {
    try {
      caps = parseCpuInfo(readFileSync("/proc/cpuinfo", "utf-8"));
    } catch (err) {
      log.debug(`Cannot read /proc/cpuinfo: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  if (caps.brandString === "") {
    return { ...caps, brandString: cpus()[0]?.model ?? "" };
  }
  return caps;
}
