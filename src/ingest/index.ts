export {
  discoverDigestFiles,
  extractDateFromFilename,
} from "./file-discovery.js";
export type { DigestFile, DiscoveryResult } from "./types.js";
