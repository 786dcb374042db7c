import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { ConfigurationError } from "../errors.mjs";

export const DEFAULT_METADATA_PATH = fileURLToPath(
  new URL("../../data/rapids-metadata.json", import.meta.url)
);

export interface PackageMetadata {
  prerelease: boolean;
  cudaSuffixed: boolean;
}

export interface VersionMetadata {
  packages: Map<string, PackageMetadata>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parsePackage(name: string, value: unknown): PackageMetadata {
  if (!isRecord(value)) {
    throw new ConfigurationError(`invalid metadata for package ${name}`);
  }
  return {
    prerelease: value.prerelease === true,
    cudaSuffixed: value.cudaSuffixed === true
  };
}

export function parseMetadata(value: unknown): Map<string, VersionMetadata> {
  if (!isRecord(value) || !isRecord(value.versions)) {
    throw new ConfigurationError("invalid release metadata: expected a versions table");
  }

  const versions = new Map<string, VersionMetadata>();
  for (const [version, entry] of Object.entries(value.versions)) {
    if (!isRecord(entry) || !isRecord(entry.packages)) {
      throw new ConfigurationError(`invalid release metadata for version ${version}`);
    }
    const packages = new Map<string, PackageMetadata>();
    for (const [name, packageEntry] of Object.entries(entry.packages)) {
      packages.set(name, parsePackage(name, packageEntry));
    }
    versions.set(version, { packages });
  }
  return versions;
}

/**
 * Release metadata loaded at most once per run and shared by every file the
 * run lints.
 */
export class MetadataCache {
  private versions: Map<string, VersionMetadata> | null = null;

  constructor(private readonly metadataPath: string = DEFAULT_METADATA_PATH) {}

  all(): Map<string, VersionMetadata> {
    if (this.versions === null) {
      let raw: string;
      try {
        raw = fs.readFileSync(this.metadataPath, "utf8");
      } catch (error) {
        throw new ConfigurationError(`cannot read release metadata ${this.metadataPath}`, {
          cause: error
        });
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error) {
        throw new ConfigurationError(`invalid JSON in ${this.metadataPath}`, { cause: error });
      }
      this.versions = parseMetadata(parsed);
    }
    return this.versions;
  }

  version(version: string): VersionMetadata {
    const metadata = this.all().get(version);
    if (!metadata) {
      throw new ConfigurationError(`no release metadata for version ${version}`);
    }
    return metadata;
  }
}

export function prereleasePackages(metadata: VersionMetadata): Set<string> {
  return new Set(
    [...metadata.packages].filter(([, entry]) => entry.prerelease).map(([name]) => name)
  );
}

export function cudaSuffixedPackages(metadata: VersionMetadata): Set<string> {
  return new Set(
    [...metadata.packages].filter(([, entry]) => entry.cudaSuffixed).map(([name]) => name)
  );
}
