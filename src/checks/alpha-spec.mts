import fs from "node:fs";
import { ConfigurationError } from "../errors.mjs";
import type { Linter } from "../linter.mjs";
import type { LintCheck, LintOptions } from "../types.mjs";
import {
  cudaSuffixedPackages,
  type MetadataCache,
  prereleasePackages,
  type VersionMetadata
} from "../utils/metadata.mjs";
import { canonicalizeName, formatRequirement, parseRequirement } from "../utils/requirement.mjs";
import {
  mappingEntries,
  mappingValues,
  parseYamlRoot,
  requote,
  sequenceItems,
  stringValue,
  valueSpan,
  type YamlNode
} from "../utils/yaml.mjs";

export const ALPHA_SPEC_CHECK_NAME = "verify-alpha-spec";
export const ALPHA_SPECIFIER = ">=0.0.0a0";
export const ALPHA_SPEC_MODES = ["development", "release"] as const;

export type AlphaSpecMode = (typeof ALPHA_SPEC_MODES)[number];

export interface AlphaSpecOptions extends LintOptions {
  mode: AlphaSpecMode;
  rapidsVersion?: string;
  rapidsVersionFile: string;
}

interface PackageSets {
  prerelease: Set<string>;
  cudaSuffixed: Set<string>;
}

function packageSets(version: VersionMetadata): PackageSets {
  return {
    prerelease: prereleasePackages(version),
    cudaSuffixed: cudaSuffixedPackages(version)
  };
}

export function isAlphaSpecMode(value: string): value is AlphaSpecMode {
  return ALPHA_SPEC_MODES.some((mode) => mode === value);
}

export function getRapidsVersion(
  options: Pick<AlphaSpecOptions, "rapidsVersion" | "rapidsVersionFile">,
  metadata: MetadataCache
): VersionMetadata {
  let version = options.rapidsVersion;
  if (version === undefined) {
    let raw: string;
    try {
      raw = fs.readFileSync(options.rapidsVersionFile, "utf8");
    } catch (error) {
      throw new ConfigurationError(`cannot read version file ${options.rapidsVersionFile}`, {
        cause: error
      });
    }
    const match = /^(\d+)\.(\d+)/.exec(raw.trim());
    if (!match) {
      throw new ConfigurationError(`invalid version in ${options.rapidsVersionFile}: ${raw.trim()}`);
    }
    version = `${match[1]}.${match[2]}`;
  }
  return metadata.version(version);
}

export function stripCudaSuffix(name: string, cudaSuffixed: Set<string>): string {
  const match = /^(.+)-cu\d+$/.exec(name);
  if (match && cudaSuffixed.has(canonicalizeName(match[1]))) {
    return match[1];
  }
  return name;
}

export function checkPackageSpec(
  linter: Linter,
  mode: AlphaSpecMode,
  packages: PackageSets,
  node: YamlNode
): void {
  const text = stringValue(node);
  const span = valueSpan(node);
  if (text === null || span === null) {
    return;
  }

  const requirement = parseRequirement(text);
  if (!requirement) {
    return;
  }
  const baseName = canonicalizeName(stripCudaSuffix(requirement.name, packages.cudaSuffixed));
  if (!packages.prerelease.has(baseName)) {
    return;
  }

  const hasAlphaSpec = requirement.specifiers.includes(ALPHA_SPECIFIER);
  if (mode === "development" && !hasAlphaSpec) {
    const fixed = formatRequirement({
      ...requirement,
      specifiers: [...requirement.specifiers, ALPHA_SPECIFIER]
    });
    linter
      .addWarning(span, `add alpha spec for RAPIDS package ${requirement.name}`)
      .addReplacement(span, requote(node, fixed));
  } else if (mode === "release" && hasAlphaSpec) {
    const fixed = formatRequirement({
      ...requirement,
      specifiers: requirement.specifiers.filter((specifier) => specifier !== ALPHA_SPECIFIER)
    });
    linter
      .addWarning(span, `remove alpha spec for RAPIDS package ${requirement.name}`)
      .addReplacement(span, requote(node, fixed));
  }
}

// Aliases are skipped: the anchored node is checked where it is defined.
function checkPackages(linter: Linter, mode: AlphaSpecMode, packages: PackageSets, node: YamlNode): void {
  for (const item of sequenceItems(node)) {
    checkPackageSpec(linter, mode, packages, item);
  }
}

export function findPackageLists(root: YamlNode): YamlNode[] {
  const lists: YamlNode[] = [];
  for (const dependencies of mappingValues(root, "dependencies")) {
    for (const dependencySet of mappingValues(dependencies)) {
      for (const [key, value] of mappingEntries(dependencySet)) {
        if (key === "common") {
          for (const outputGroup of sequenceItems(value)) {
            lists.push(...mappingValues(outputGroup, "packages"));
          }
        } else if (key === "specific") {
          for (const matrixMatcher of sequenceItems(value)) {
            for (const matrices of mappingValues(matrixMatcher, "matrices")) {
              for (const matrix of sequenceItems(matrices)) {
                lists.push(...mappingValues(matrix, "packages"));
              }
            }
          }
        }
      }
    }
  }
  return lists;
}

export function createAlphaSpecCheck(metadata: MetadataCache): LintCheck<AlphaSpecOptions> {
  let packages: PackageSets | null = null;

  return (linter, options) => {
    const sets = (packages ??= packageSets(getRapidsVersion(options, metadata)));
    const root = parseYamlRoot(linter.filename, linter.content);
    for (const list of findPackageLists(root)) {
      checkPackages(linter, options.mode, sets, list);
    }
  };
}
