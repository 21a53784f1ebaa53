import fs from "node:fs/promises";
import path from "node:path";
import type { DigestFile, DiscoveryResult } from "./types.js";

const DIGEST_FILE_NAME = /^(\d{4}-\d{2}-\d{2})\.md$/;
const MARKDOWN_EXTENSION = ".md";

export function extractDateFromFilename(fileName: string): string | null {
  const match = DIGEST_FILE_NAME.exec(fileName);
  return match?.[1] ?? null;
}

export async function discoverDigestFiles(
  inputPath: string,
): Promise<DiscoveryResult> {
  const resolvedPath = path.resolve(inputPath);
  let stats: Awaited<ReturnType<typeof fs.stat>>;
  try {
    stats = await fs.stat(resolvedPath);
  } catch {
    throw new Error(`Error: Path '${inputPath}' does not exist`);
  }

  if (stats.isFile()) {
    const file = toDigestFile(resolvedPath, inputPath);
    return {
      inputPath,
      resolvedPath,
      source: "file",
      files: file ? [file] : [],
    };
  }

  if (!stats.isDirectory()) {
    throw new Error(
      `Error: Path '${inputPath}' is neither a file nor a directory`,
    );
  }

  const realRoot = await fs.realpath(resolvedPath);
  const files: DigestFile[] = [];
  await walkDirectory(
    { rootPath: realRoot, inputPath, visitedDirs: new Set<string>() },
    realRoot,
    files,
  );
  files.sort(compareByPath);
  return { inputPath, resolvedPath, source: "directory", files };
}

interface WalkContext {
  readonly rootPath: string;
  readonly inputPath: string;
  readonly visitedDirs: Set<string>;
}

async function walkDirectory(
  context: WalkContext,
  currentPath: string,
  files: DigestFile[],
): Promise<void> {
  const realCurrent = await fs.realpath(currentPath);
  if (context.visitedDirs.has(realCurrent)) {
    return;
  }
  context.visitedDirs.add(realCurrent);

  const dirEntries = await fs.readdir(currentPath, { withFileTypes: true });
  for (const dirent of dirEntries) {
    const absolutePath = path.join(currentPath, dirent.name);

    // Links are walked through their own path; visitedDirs breaks cycles.
    if (dirent.isSymbolicLink()) {
      const resolved = await safeRealpath(absolutePath);
      if (!resolved) {
        continue;
      }

      const stats = await fs.stat(resolved);
      if (stats.isDirectory()) {
        await walkDirectory(context, absolutePath, files);
      } else if (stats.isFile()) {
        addDigestFile(context, absolutePath, files);
      }
      continue;
    }

    if (dirent.isDirectory()) {
      await walkDirectory(context, absolutePath, files);
      continue;
    }

    if (dirent.isFile()) {
      addDigestFile(context, absolutePath, files);
    }
  }
}

function addDigestFile(
  context: WalkContext,
  absolutePath: string,
  files: DigestFile[],
): void {
  if (path.extname(absolutePath) !== MARKDOWN_EXTENSION) {
    return;
  }
  const relativePath = toRelativePosix(context.rootPath, absolutePath);
  const file = toDigestFile(
    absolutePath,
    path.join(context.inputPath, relativePath),
    relativePath,
  );
  if (file) {
    files.push(file);
  }
}

function toDigestFile(
  absolutePath: string,
  displayPath: string,
  relativePath: string = path.basename(absolutePath),
): DigestFile | null {
  const date = extractDateFromFilename(path.basename(absolutePath));
  if (!date) {
    return null;
  }
  return { absolutePath, relativePath, displayPath, date };
}

function compareByPath(a: DigestFile, b: DigestFile): number {
  if (a.absolutePath === b.absolutePath) {
    return 0;
  }
  return a.absolutePath < b.absolutePath ? -1 : 1;
}

function toRelativePosix(rootPath: string, absolutePath: string): string {
  const relative = path.relative(rootPath, absolutePath);
  return relative.split(path.sep).join(path.posix.sep);
}

async function safeRealpath(targetPath: string): Promise<string | null> {
  try {
    return await fs.realpath(targetPath);
  } catch {
    return null;
  }
}
