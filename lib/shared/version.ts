/**
 * Version constant read from package.json at module load time
 */
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const projectRoot = join(__dirname, "../..");
const packageJsonPath = join(projectRoot, "package.json");

const readVersion = (): string => {
  const json: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
  if (
    typeof json === "object" && json !== null && "version" in json &&
    typeof json.version === "string"
  ) {
    return json.version;
  }
  return "unknown";
};

export const VERSION = readVersion();
