import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { findEnvFile, loadEnvFile } from "../src/lib/env";

describe("loadEnvFile", () => {
  let root: string;
  let nested: string;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    root = fs.mkdtempSync(path.join(os.tmpdir(), "counteroffer-env-"));
    nested = path.join(root, "apps", "api");
    fs.mkdirSync(nested, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
    delete process.env.COUNTEROFFER_ENV_TEST;
    vi.restoreAllMocks();
  });

  it("finds the .env of an enclosing directory", () => {
    fs.writeFileSync(path.join(root, ".env"), "COUNTEROFFER_ENV_TEST=from-file\n");

    expect(findEnvFile(nested)).toBe(path.join(root, ".env"));
  });

  it("loads the file and returns its path", () => {
    fs.writeFileSync(path.join(root, ".env"), "COUNTEROFFER_ENV_TEST=from-file\n");

    expect(loadEnvFile(nested)).toBe(path.join(root, ".env"));
    expect(process.env.COUNTEROFFER_ENV_TEST).toBe("from-file");
  });

  it("keeps variables that are already set", () => {
    fs.writeFileSync(path.join(root, ".env"), "COUNTEROFFER_ENV_TEST=from-file\n");
    process.env.COUNTEROFFER_ENV_TEST = "from-shell";

    loadEnvFile(nested);

    expect(process.env.COUNTEROFFER_ENV_TEST).toBe("from-shell");
  });
});
