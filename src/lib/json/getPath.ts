export type JsonObject = { [key: string]: unknown };

export function isObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Walks `path` through nested objects and arrays. Missing intermediates and
 * non-container values along the way yield `undefined` instead of throwing;
 * numeric segments index into arrays.
 */
export function getPath(root: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = root;
  for (const segment of path) {
    if (typeof segment === "number") {
      if (!Array.isArray(current) || segment < 0 || segment >= current.length) return undefined;
      current = current[segment];
      continue;
    }
    if (!isObject(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

export function getString(root: unknown, path: ReadonlyArray<string | number>): string | undefined {
  const value = getPath(root, path);
  return typeof value === "string" ? value : undefined;
}

export function getArray(root: unknown, path: ReadonlyArray<string | number>): unknown[] {
  const value = getPath(root, path);
  return Array.isArray(value) ? value : [];
}

export function getObject(root: unknown, path: ReadonlyArray<string | number>): JsonObject {
  const value = getPath(root, path);
  return isObject(value) ? value : {};
}
