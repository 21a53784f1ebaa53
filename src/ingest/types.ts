export interface DigestFile {
  readonly absolutePath: string;
  readonly relativePath: string;
  /** Path as the user would recognise it, rooted at the input argument. */
  readonly displayPath: string;
  /** `YYYY-MM-DD`, taken from the file name. */
  readonly date: string;
}

export interface DiscoveryResult {
  readonly inputPath: string;
  readonly resolvedPath: string;
  readonly source: "file" | "directory";
  readonly files: readonly DigestFile[];
}
