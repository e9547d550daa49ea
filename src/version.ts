import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

function readPackageVersion(relative: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(readFileSync(fileURLToPath(new URL(relative, import.meta.url)), "utf-8"));
    if (parsed !== null && typeof parsed === "object" && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Service version, used by /healthz and telemetry.
 *
 * SERVICE_VERSION overrides; otherwise package.json, found from src/ in dev
 * and from dist/src/ after a build.
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ?? readPackageVersion("../package.json") ?? readPackageVersion("../../package.json") ?? "0.0.0";
