import type { Identifier } from "./types.js";

export function parseIdentifier(value: string): Identifier | undefined {
  const parts = value.split(":");
  if (parts.length !== 4) {
    return undefined;
  }
  const [type, namespace, name, version] = parts;
  if (type.trim().length === 0 || name.trim().length === 0) {
    return undefined;
  }
  return { type, namespace, name, version };
}

export function identifierToString(id: Identifier): string {
  return [id.type, id.namespace, id.name, id.version].join(":");
}

export function sameIdentifier(a: Identifier, b: Identifier): boolean {
  return (
    a.type === b.type &&
    a.namespace === b.namespace &&
    a.name === b.name &&
    a.version === b.version
  );
}

/**
 * Matches a plain string against a pattern where `*` stands for any run of
 * characters. Matching is case-sensitive and anchored at both ends.
 */
export function matchesPattern(value: string, pattern: string): boolean {
  if (!pattern.includes("*")) {
    return value === pattern;
  }
  const escaped = pattern
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${escaped}$`).test(value);
}
