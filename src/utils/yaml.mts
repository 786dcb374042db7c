import {
  type Alias,
  isAlias,
  isMap,
  isScalar,
  isSeq,
  parseDocument,
  type Scalar,
  type YAMLMap,
  type YAMLSeq
} from "yaml";
import { SourceParseError } from "../errors.mjs";
import type { Span } from "../types.mjs";

export type YamlNode =
  | { kind: "scalar"; node: Scalar }
  | { kind: "sequence"; node: YAMLSeq }
  | { kind: "mapping"; node: YAMLMap }
  | { kind: "alias"; node: Alias }
  | { kind: "null" };

export function classifyNode(node: unknown): YamlNode {
  if (isAlias(node)) {
    return { kind: "alias", node };
  }
  if (isScalar(node)) {
    return node.value === null ? { kind: "null" } : { kind: "scalar", node };
  }
  if (isSeq(node)) {
    return { kind: "sequence", node };
  }
  if (isMap(node)) {
    return { kind: "mapping", node };
  }
  return { kind: "null" };
}

export function parseYamlRoot(filename: string, content: string): YamlNode {
  const document = parseDocument(content);
  const [firstError] = document.errors;
  if (firstError) {
    throw new SourceParseError(filename, firstError.message, { cause: firstError });
  }
  return classifyNode(document.contents);
}

export function sequenceItems(node: YamlNode): YamlNode[] {
  return node.kind === "sequence" ? node.node.items.map((item) => classifyNode(item)) : [];
}

export function mappingEntries(node: YamlNode): [string | null, YamlNode][] {
  if (node.kind !== "mapping") {
    return [];
  }
  return node.node.items.map((pair) => [
    isScalar(pair.key) && typeof pair.key.value === "string" ? pair.key.value : null,
    classifyNode(pair.value)
  ]);
}

/**
 * Values of a mapping, restricted to entries whose key is the string `key`
 * when one is given, in document order.
 */
export function mappingValues(node: YamlNode, key?: string): YamlNode[] {
  return mappingEntries(node)
    .filter(([entryKey]) => key === undefined || entryKey === key)
    .map(([, value]) => value);
}

export function stringValue(node: YamlNode): string | null {
  return node.kind === "scalar" && typeof node.node.value === "string" ? node.node.value : null;
}

// Excludes the anchor and tag that may precede the value.
export function valueSpan(node: YamlNode): Span | null {
  if (node.kind !== "scalar" || !node.node.range) {
    return null;
  }
  const [start, valueEnd] = node.node.range;
  return [start, valueEnd];
}

export function requote(node: YamlNode, text: string): string {
  if (node.kind !== "scalar") {
    return text;
  }
  switch (node.node.type) {
    case "QUOTE_DOUBLE":
      return JSON.stringify(text);
    case "QUOTE_SINGLE":
      return `'${text.replace(/'/g, "''")}'`;
    default:
      return text;
  }
}
