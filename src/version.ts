import { createRequire } from "node:module";

function readVersionFromPackageJson(): string | null {
  try {
    const require = createRequire(import.meta.url);
    const pkg: unknown = require("../package.json");
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return null;
  } catch {
    return null;
  }
}

// Bundled builds may inject the version through the environment.
export const VERSION = process.env.BULK_PROVISIONER_VERSION || readVersionFromPackageJson() || "0.0.0";
