export {
  BintrayClient,
  DEFAULT_API_BASE_URL,
  DEFAULT_DL_BASE_URL,
  type ClientOptions,
  type HttpMethod,
  type RequestOptions,
} from "./client.js";
export { Subject } from "./subject.js";
export { Repository, isIndexedRepositoryType, REPOSITORY_TYPES, type RepositoryType } from "./repository.js";
export { Package, PACKAGE_MATURITIES, type PackageMaturity } from "./package.js";
export { Version, type PublishOptions } from "./version.js";
export { Content, type WaitForAvailabilityOptions, type WaitForIndexationOptions } from "./content.js";
export {
  BintrayError,
  isBintrayError,
  defaultStatusMessage,
  prettifyJson,
  readApiError,
  reportWarning,
  type BintrayErrorKind,
} from "./errors.js";
export {
  CHECKSUM_HEADER,
  checksumBytes,
  checksumFile,
  checksumFromHex,
  checksumFromResponse,
  checksumToHex,
  type ContentChecksum,
} from "./checksum.js";
export { compareVersions, sortVersions } from "./versions.js";
export { waitForCondition, type Probe, type ProbeResult, type WaitOptions } from "./wait.js";
export { parsePrimary, parseRepomd, rpmPackageFilename, type PrimaryPackage, type RepomdEntry } from "./repodata.js";
export { cleanPath } from "./paths.js";
export {
  createConsoleLogger,
  parseLogLevel,
  scopedLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type ScopedLogger,
} from "./logger.js";
