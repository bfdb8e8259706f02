import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

interface PackageJson {
  version?: string;
}

const FALLBACK_VERSION = "0.0.0";

const isPackageJson = (value: unknown): value is PackageJson =>
  typeof value === "object" && value !== null;

const getVersionFromPackageJson = (): string => {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    const pkgPath = join(__dirname, "..", "..", "package.json");
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (isPackageJson(pkg) && typeof pkg.version === "string") {
      return pkg.version;
    }
    return FALLBACK_VERSION;
  } catch {
    return FALLBACK_VERSION;
  }
};

let cachedVersion: string | undefined;

export const getVersion = (): string => {
  cachedVersion ??= getVersionFromPackageJson();
  return cachedVersion;
};
