const NAME_PATTERN = /^\s*([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*(\[[^\]]*\])?\s*/;
const SPECIFIER_PATTERN = /^(~=|===|==|!=|<=|>=|<|>)\s*([A-Za-z0-9.*+!_-]+)$/;

export interface Requirement {
  name: string;
  extras: string;
  specifiers: string[];
  marker: string | null;
}

/**
 * Parses a PEP 508 style requirement such as `cudf[extra]>=24.04,<24.06; python_version>"3.9"`.
 * Returns null for strings that are not requirements (pip flags, conda match specs).
 */
export function parseRequirement(text: string): Requirement | null {
  const nameMatch = NAME_PATTERN.exec(text);
  if (!nameMatch) {
    return null;
  }

  const rest = text.slice(nameMatch[0].length);
  const markerIndex = rest.indexOf(";");
  const specifierText = (markerIndex < 0 ? rest : rest.slice(0, markerIndex)).trim();
  const marker = markerIndex < 0 ? null : rest.slice(markerIndex + 1).trim();

  const specifiers: string[] = [];
  if (specifierText.length > 0) {
    for (const part of specifierText.split(",")) {
      const specifierMatch = SPECIFIER_PATTERN.exec(part.trim());
      if (!specifierMatch) {
        return null;
      }
      specifiers.push(`${specifierMatch[1]}${specifierMatch[2]}`);
    }
  }

  return {
    name: nameMatch[1],
    extras: nameMatch[2] ?? "",
    specifiers,
    marker
  };
}

export function formatRequirement(requirement: Requirement): string {
  const marker = requirement.marker === null ? "" : `; ${requirement.marker}`;
  return `${requirement.name}${requirement.extras}${requirement.specifiers.join(",")}${marker}`;
}

export function canonicalizeName(name: string): string {
  return name.replace(/[-_.]+/g, "-").toLowerCase();
}
