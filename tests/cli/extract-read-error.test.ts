import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runExtractCommand } from "../../src/cli/extract-command.js";
import type { DigestFile } from "../../src/ingest/types.js";

vi.mock("../../src/digest/digest-parser.js", async (importOriginal) => {
  const actual =
    await importOriginal<typeof import("../../src/digest/digest-parser.js")>();
  return {
    ...actual,
    parseDigestFile: vi.fn(async (file: DigestFile) => {
      if (file.date === "2020-01-01") {
        throw new Error("EACCES: permission denied");
      }
      return await actual.parseDigestFile(file);
    }),
  };
});

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "trending-digest-err-"));
});

afterEach(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
});

describe("extract command read errors", () => {
  it("skips unreadable files and keeps processing the rest", async () => {
    await fs.writeFile(
      path.join(tempDir, "2020-01-01.md"),
      "#### go\n* [a/b](https://github.com/a/b):x\n",
      "utf8",
    );
    await fs.writeFile(
      path.join(tempDir, "2020-01-02.md"),
      "#### go\n* [c/d](https://github.com/c/d):y\n",
      "utf8",
    );
    const infoLines: string[] = [];
    const warnLines: string[] = [];

    const summary = await runExtractCommand(
      { input: tempDir, output: path.join(tempDir, "trending.db") },
      {
        info: async (message) => {
          infoLines.push(message);
        },
        warn: async (message) => {
          warnLines.push(message);
        },
      },
    );

    expect(summary.totalRecords).toBe(1);
    expect(summary.files[0]).toEqual({
      file: path.join(tempDir, "2020-01-01.md"),
      date: "2020-01-01",
      records: 0,
      warnings: 0,
      error: "EACCES: permission denied",
    });
    expect(warnLines).toEqual([
      `Error reading ${path.join(tempDir, "2020-01-01.md")}: EACCES: permission denied`,
    ]);
    expect(infoLines).toContain("Processed 2020-01-01.md: 0 repositories");
    expect(infoLines).toContain("Processed 2020-01-02.md: 1 repositories");
  });

  it("treats undecodable bytes as a read error for that file", async () => {
    const badFile = path.join(tempDir, "2020-01-03.md");
    await fs.writeFile(
      badFile,
      Buffer.concat([
        Buffer.from("#### go\n* [a/b](https://github.com/a/b):bad ", "utf8"),
        Buffer.from([0xff, 0xfe, 0x80]),
      ]),
    );
    await fs.writeFile(
      path.join(tempDir, "2020-01-04.md"),
      "#### go\n* [c/d](https://github.com/c/d):y\n",
      "utf8",
    );
    const warnLines: string[] = [];

    const summary = await runExtractCommand(
      { input: tempDir, output: path.join(tempDir, "trending.db") },
      {
        info: async () => {},
        warn: async (message) => {
          warnLines.push(message);
        },
      },
    );

    expect(summary.totalRecords).toBe(1);
    expect(summary.files[0]?.records).toBe(0);
    expect(warnLines).toEqual([
      `Error reading ${badFile}: The encoded data was not valid for encoding utf-8`,
    ]);
  });
});
