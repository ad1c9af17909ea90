export { parseRpmSpec, parseDependencyList } from "./parse.js";
export { parseChangelog } from "./changelog.js";
export { expandMacros } from "./macros.js";
export { rpmFilename, specRpmFilename } from "./filename.js";
export {
  RPM_SECTION_NAMES,
  RpmSpecError,
  type ChangelogEntry,
  type RpmNevra,
  type RpmSection,
  type RpmSectionName,
  type RpmSpec,
} from "./types.js";
