import dotenv from "dotenv";
import fs from "fs";
import path from "path";

/** Nearest .env at or above `startDir`, so workspace scripts find the repo-root file. */
export function findEnvFile(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const envPath = path.join(dir, ".env");
    if (fs.existsSync(envPath)) return envPath;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Loads the nearest .env into process.env without overriding variables that
 * are already set. Returns the file used, for loadConfig to report.
 */
export function loadEnvFile(startDir: string = process.cwd()): string | null {
  const envPath = findEnvFile(startDir);
  if (envPath === null) {
    console.warn("env: No .env file found, using process environment only");
    return null;
  }
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    throw new Error(`Cannot read ${envPath}: ${result.error.message}`);
  }
  console.log(`env: Loaded ${envPath}`);
  return envPath;
}
