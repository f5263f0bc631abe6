/**
 * Pre-flight check of the configured model engine.
 * Usage: npm run self-test --workspace @counteroffer/api
 */

import { loadConfig } from "../config/app-config";
import { createTextGenerator } from "../lib/engines";
import { loadEnvFile } from "../lib/env";

async function main(): Promise<void> {
  const envFile = loadEnvFile();
  const config = loadConfig(process.env, envFile);
  const generator = createTextGenerator(config.engine);
  const info = generator.describe();

  console.log(`self-test: Checking ${info.engine} engine (${info.provider ?? info.url ?? "default"}, ${info.model})...`);
  const result = await generator.selfTest();

  if (result.success) {
    console.log(`self-test: OK - ${result.message}`);
  } else {
    console.error(`self-test: FAILED - ${result.message}`);
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error("self-test: Unexpected failure:", error);
  process.exit(1);
});
