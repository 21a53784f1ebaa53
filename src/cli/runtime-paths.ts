import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const DEFAULT_INPUT_PATH = ".";
export const DEFAULT_DATABASE_PATH = "trending.db";

export function resolveDatabasePath(customPath?: string): string {
  if (!customPath) {
    return path.resolve(process.cwd(), DEFAULT_DATABASE_PATH);
  }
  if (customPath === ":memory:") {
    return customPath;
  }
  return path.resolve(assertNoTilde(customPath));
}

function assertNoTilde(input: string): string {
  if (input.startsWith("~")) {
    throw new Error(
      `Path must not start with '~': ${input}. Use an absolute path.`,
    );
  }
  return input;
}

export async function loadToolVersion(): Promise<string> {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(moduleDir, "..", "..");
  try {
    const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
    const json: unknown = JSON.parse(raw);
    if (
      typeof json === "object" &&
      json !== null &&
      "version" in json &&
      typeof json.version === "string"
    ) {
      return json.version;
    }
    return "0.0.0";
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return "0.0.0";
    }
    throw error;
  }
}

export function todayIsoDate(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}
