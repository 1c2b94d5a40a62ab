import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

export function getPackageVersion(fallback = "version unavailable"): string {
  try {
    const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
    const pkgRaw = readFileSync(pkgPath, "utf8");
    const parsed: unknown = JSON.parse(pkgRaw);
    const v =
      typeof parsed === "object" &&
      parsed !== null &&
      "version" in parsed &&
      typeof parsed.version === "string"
        ? parsed.version
        : undefined;
    if (v && v.length > 0) {
      return v;
    }
  } catch {
    // fall through to the npm-provided version
  }
  const envV = process.env["npm_package_version"];
  if (typeof envV === "string" && envV.length > 0) {
    return envV;
  }
  return fallback;
}
