import type { BuildInfo } from "./types/build-info.js";

const UNKNOWN = "unknown";

/**
 * Read build identity injected by the release pipeline.
 * Missing values are reported as "unknown".
 */
export function loadBuildInfo(env: NodeJS.ProcessEnv = process.env): BuildInfo {
  return {
    scmDescription: env.DIAGKIT_SCM_DESC || UNKNOWN,
    branch: env.DIAGKIT_SCM_BRANCH || UNKNOWN,
    revision: env.DIAGKIT_SCM_REV || UNKNOWN,
    buildDate: env.DIAGKIT_BUILD_DATE || UNKNOWN,
    buildName: env.DIAGKIT_BUILD_NAME || UNKNOWN,
  };
}

export function isScmDirty(info: BuildInfo): boolean {
  return info.scmDescription.includes("dirty");
}
