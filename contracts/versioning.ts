export interface ContractVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

const VERSION_PATTERN = /^(\d+)\.(\d+)(?:\.(\d+))?$/;

export function parseVersion(raw: string): ContractVersion | null {
  const match = VERSION_PATTERN.exec(raw.trim());
  if (!match) return null;
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: match[3] === undefined ? 0 : Number(match[3]),
  };
}

export function isValidVersion(raw: string): boolean {
  return parseVersion(raw) !== null;
}

export function compareVersions(a: ContractVersion, b: ContractVersion): number {
  if (a.major !== b.major) return a.major - b.major;
  if (a.minor !== b.minor) return a.minor - b.minor;
  return a.patch - b.patch;
}

export type Compatibility =
  | { readonly kind: "same" }
  | { readonly kind: "older-minor" }
  | { readonly kind: "newer-minor" }
  | { readonly kind: "major-mismatch" };

/**
 * Classifies a payload's declared version against the schema version.
 * Patch differences are treated as the same version.
 */
export function checkCompatibility(
  payloadVersion: ContractVersion,
  schemaVersion: ContractVersion,
): Compatibility {
  if (payloadVersion.major !== schemaVersion.major) return { kind: "major-mismatch" };
  if (payloadVersion.minor < schemaVersion.minor) return { kind: "older-minor" };
  if (payloadVersion.minor > schemaVersion.minor) return { kind: "newer-minor" };
  return { kind: "same" };
}

export function formatVersion(version: ContractVersion): string {
  return `${String(version.major)}.${String(version.minor)}.${String(version.patch)}`;
}
