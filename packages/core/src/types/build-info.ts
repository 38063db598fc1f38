/** Static identity of the running build. */
export interface BuildInfo {
  /** `git describe` output; contains "dirty" for uncommitted builds */
  scmDescription: string;
  branch: string;
  revision: string;
  buildDate: string;
  buildName: string;
}

export type CpuVendor = "Intel" | "Amd" | "Other";

/** x86-64 extensions reported as one boolean field each. */
export interface CpuFeatures {
  aes: boolean;
  avx: boolean;
  avx2: boolean;
  bmi1: boolean;
  bmi2: boolean;
  fma: boolean;
  fma4: boolean;
  sse: boolean;
  sse2: boolean;
  sse3: boolean;
  ssse3: boolean;
  sse4_1: boolean;
  sse4_2: boolean;
}

export interface CpuCaps {
  /** Vendor identification string, e.g. "GenuineIntel" */
  cpuString: string;
  /** Marketing model name */
  brandString: string;
  vendor: CpuVendor;
  features: CpuFeatures;
}
