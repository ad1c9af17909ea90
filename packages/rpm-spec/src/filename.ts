import type { RpmNevra, RpmSpec } from "./types.js";

function hasEpoch(epoch: RpmNevra["epoch"]): boolean {
  if (epoch === undefined) return false;
  const text = String(epoch).trim();
  return text !== "" && text !== "0";
}

/**
 * File name of a built package: `name-version-release.arch.rpm`, prefixed
 * with `epoch:` for a non-zero epoch.
 */
export function rpmFilename(nevra: RpmNevra): string {
  const base = `${nevra.name}-${nevra.version}-${nevra.release}.${nevra.arch}.rpm`;
  return hasEpoch(nevra.epoch) ? `${String(nevra.epoch).trim()}:${base}` : base;
}

export function specRpmFilename(spec: RpmSpec, arch?: string): string {
  return rpmFilename({
    name: spec.name,
    epoch: spec.epoch,
    version: spec.version,
    release: spec.release,
    arch: arch ?? spec.buildArch ?? "noarch",
  });
}
