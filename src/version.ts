import fs from "node:fs";

const PACKAGE_NAME = "liftoff";

// src/version.ts and dist/version.js both sit one level below the package root.
const PACKAGE_JSON_URL = new URL("../package.json", import.meta.url);

function readVersionFromPackageJson(): string | null {
  if (!fs.existsSync(PACKAGE_JSON_URL)) {
    return null;
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(PACKAGE_JSON_URL, "utf-8"));
  if (
    typeof parsed !== "object" ||
    parsed === null ||
    !("name" in parsed) ||
    !("version" in parsed) ||
    parsed.name !== PACKAGE_NAME ||
    typeof parsed.version !== "string"
  ) {
    return null;
  }
  return parsed.version.trim() || null;
}

export const VERSION = readVersionFromPackageJson() ?? "0.0.0";
