import * as fs from "node:fs";
import * as path from "node:path";

// package.json sits two levels up from both src/utils and dist/utils.
export function getPackageVersion(): string {
  const packageJsonPath = path.resolve(__dirname, "..", "..", "package.json");
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(packageJsonPath, "utf-8"));
  } catch {
    return "unknown";
  }
  if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
    return parsed.version;
  }
  return "unknown";
}

// Example: "deploystamp 1.0.0"
export function getAppVersionString(): string {
  return `deploystamp ${getPackageVersion()}`;
}
