import { execa } from "execa";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

const CLI = path.join(process.cwd(), "src/cli.ts");

/**
 * Create a temporary directory for a test.
 */
export async function createTempDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), "wordspray-test-"));
}

/**
 * Clean up a temp directory.
 */
export async function cleanup(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Write a config file into `dir` and return its path.
 */
export async function writeTestConfig(dir: string, toml: string): Promise<string> {
  const configPath = path.join(dir, "wordspray.toml");
  await fs.writeFile(configPath, toml, "utf8");
  return configPath;
}

/**
 * Run the CLI from its TypeScript source. Never rejects; inspect exitCode.
 * Output is returned untrimmed.
 */
export async function runCli(args: string[]) {
  return await execa("node", ["--import", "tsx", CLI, ...args], {
    reject: false,
    stripFinalNewline: false,
  });
}
