import { readFileSync } from "fs";
import path from "path";

const defaultPackageJsonPath = path.join(__dirname, "../../../package.json");

/**
 * Version of this package, read from the package.json that sits above both src/ and dist/.
 */
export const readPackageVersion = (packageJsonPath = defaultPackageJsonPath): string => {
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
  if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
    return parsed.version;
  }
  return "unknown";
};
