/**
 * Path Resolver - dotted-path addressing into nested configuration objects.
 *
 * Grammar: segments separated by `.`; a segment made only of digits indexes an
 * array, any other segment indexes an object's own keys.
 *
 *   conditions.string.0.operation
 *
 * A lookup that cannot proceed (missing key, index out of range, indexing a
 * primitive, key on an array, index on an object) is NotFound, which is a
 * normal outcome and never an exception.
 */

import type { ConfigurationObject } from '../types';

// =============================================================================
// § Types
// =============================================================================

export type PathSegment =
  | { kind: 'key'; key: string }
  | { kind: 'index'; index: number };

export type PathLookup =
  | { found: true; value: unknown }
  | { found: false };

const NOT_FOUND: PathLookup = { found: false };

const INDEX_SEGMENT = /^\d+$/;

// =============================================================================
// § Helpers
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split a path into typed segments.
 * Returns null for the empty path and for paths with empty segments.
 */
export function parsePath(path: string): PathSegment[] | null {
  if (path.length === 0) return null;

  const segments: PathSegment[] = [];
  for (const part of path.split('.')) {
    if (part.length === 0) return null;
    segments.push(
      INDEX_SEGMENT.test(part)
        ? { kind: 'index', index: Number(part) }
        : { kind: 'key', key: part }
    );
  }
  return segments;
}

export function isValidPath(path: string): boolean {
  return parsePath(path) !== null;
}

function step(current: unknown, segment: PathSegment): PathLookup {
  if (segment.kind === 'index') {
    if (!Array.isArray(current) || segment.index >= current.length) return NOT_FOUND;
    return { found: true, value: current[segment.index] };
  }
  if (!isRecord(current) || !Object.hasOwn(current, segment.key)) return NOT_FOUND;
  return { found: true, value: current[segment.key] };
}

// =============================================================================
// § Lookup
// =============================================================================

/**
 * Resolve a path against a configuration.
 *
 * `undefined` and `null` both count as NotFound: a cleared field has no value.
 */
export function resolvePath(config: ConfigurationObject, path: string): PathLookup {
  const segments = parsePath(path);
  if (!segments) return NOT_FOUND;

  let current: unknown = config;
  for (const segment of segments) {
    const next = step(current, segment);
    if (!next.found || next.value === undefined || next.value === null) return NOT_FOUND;
    current = next.value;
  }
  return { found: true, value: current };
}

/**
 * Value at a path, or `undefined` when NotFound.
 */
export function getFieldValue(config: ConfigurationObject, path: string): unknown {
  const lookup = resolvePath(config, path);
  return lookup.found ? lookup.value : undefined;
}

export function hasPath(config: ConfigurationObject, path: string): boolean {
  return resolvePath(config, path).found;
}

// =============================================================================
// § Copy-on-write updates
// =============================================================================

function shallowCopy(container: unknown[] | Record<string, unknown>): unknown[] | Record<string, unknown> {
  return Array.isArray(container) ? [...container] : { ...container };
}

/**
 * Return a copy of `config` with `value` stored at `path`.
 *
 * Only the containers along the path are copied. Missing object levels are
 * created; a missing array level leaves the configuration unchanged, because
 * an index cannot be invented.
 */
export function setPathValue(
  config: ConfigurationObject,
  path: string,
  value: unknown
): ConfigurationObject {
  const segments = parsePath(path);
  if (!segments) return config;

  const updated = write(config, segments, value);
  return isRecord(updated) ? updated : config;
}

function write(current: unknown, segments: PathSegment[], value: unknown): unknown {
  const [head, ...rest] = segments;
  if (!head) return value;

  if (head.kind === 'index') {
    if (!Array.isArray(current) || head.index >= current.length) return current;
    const child = write(current[head.index], rest, value);
    if (child === current[head.index]) return current;
    const copy = [...current];
    copy[head.index] = child;
    return copy;
  }

  const container = current === undefined || current === null ? {} : current;
  if (!isRecord(container)) return current;

  const existing = container[head.key];
  if (rest.length > 0 && rest[0]?.kind === 'index' && !Array.isArray(existing)) {
    return current;
  }
  const child = write(existing, rest, value);
  if (child === existing) return current;
  return { ...container, [head.key]: child };
}

/**
 * Return a copy of `config` without the value at `path`.
 *
 * Deleting an array index clears the slot and keeps the array length, so
 * later elements stay at their paths. The cleared slot reads as NotFound.
 * An absent path returns the configuration unchanged.
 */
export function deletePathValue(config: ConfigurationObject, path: string): ConfigurationObject {
  const segments = parsePath(path);
  if (!segments || !hasPath(config, path)) return config;

  const updated = remove(config, segments);
  return isRecord(updated) ? updated : config;
}

function remove(current: unknown, segments: PathSegment[]): unknown {
  const [head, ...rest] = segments;
  if (!head || (!Array.isArray(current) && !isRecord(current))) return current;

  const copy = shallowCopy(current);
  if (head.kind === 'index') {
    if (!Array.isArray(copy)) return current;
    if (rest.length === 0) {
      copy[head.index] = undefined;
    } else {
      copy[head.index] = remove(copy[head.index], rest);
    }
    return copy;
  }

  if (!isRecord(copy)) return current;
  if (rest.length === 0) {
    delete copy[head.key];
  } else {
    copy[head.key] = remove(copy[head.key], rest);
  }
  return copy;
}
