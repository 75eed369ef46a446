const INDEX_SEGMENT = /^\d+$/;

type PathTree = Map<string, PathTree | true>;

function buildTree(paths: string[]): PathTree {
  const root: PathTree = new Map();
  for (const path of paths) {
    const segments = path.split('.').filter((s) => s.length > 0);
    let node = root;
    segments.forEach((segment, i) => {
      if (i === segments.length - 1) {
        node.set(segment, true);
        return;
      }
      const next = node.get(segment);
      if (next === true) return;
      const child: PathTree = next ?? new Map();
      node.set(segment, child);
      node = child;
    });
  }
  return root;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function walk(value: unknown, tree: PathTree, redaction: string): unknown {
  if (tree.size === 0) return value;

  if (Array.isArray(value)) {
    // Numeric segments address one element; other segments apply to every element.
    const general: PathTree = new Map(
      [...tree].filter(([segment]) => !INDEX_SEGMENT.test(segment))
    );
    return value.map((item: unknown, index) => {
      const own = tree.get(String(index));
      if (own === true) return redaction;
      const merged: PathTree = new Map([...general, ...(own ?? new Map())]);
      return walk(item, merged, redaction);
    });
  }

  if (!isPlainObject(value)) return value;

  const result: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    const node = tree.get(key);
    if (node === true) {
      result[key] = redaction;
    } else if (node) {
      result[key] = walk(child, node, redaction);
    } else {
      result[key] = child;
    }
  }
  return result;
}

/**
 * Returns a copy of `obj` with the values at the given dot-notation paths
 * replaced by `redaction`.
 *
 * Paths address nested keys (`token.accessToken`), array indices (`creds.1`),
 * or every element of an array when the segment is not numeric
 * (`identities.password`). Only plain objects and arrays are traversed; dates,
 * class instances and primitives are returned as they are.
 */
export function redact<T>(obj: T, paths: string[], redaction = '[redacted]'): T {
  if (obj === null || typeof obj !== 'object' || paths.length === 0) {
    return obj;
  }
  // walk preserves the container shape of its input.
  return walk(obj, buildTree(paths), redaction) as T;
}
