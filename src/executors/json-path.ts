interface PathSegment {
  key: string;
  /**
   * `-1` when the segment has no `[n]` suffix.
   */
  index: number;
}

export class JsonPathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JsonPathError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJsonPath(path: string): PathSegment[] {
  return path.split('.').map((part) => {
    const bracket = part.indexOf('[');

    if (bracket < 0) {
      return { key: part, index: -1 };
    }

    const index = Number.parseInt(part.slice(bracket + 1).replace(/\]$/, ''), 10);
    return { key: part.slice(0, bracket), index: Number.isNaN(index) ? 0 : index };
  });
}

function selectIndex(value: unknown, index: number): unknown {
  if (!Array.isArray(value) || index >= value.length) {
    throw new JsonPathError(`invalid array index: ${index}`);
  }

  return value[index];
}

/**
 * Selects part of a JSON document with a dot/index path such as `data.items[0].name`.
 * Strings are returned as-is, `null` as `null`, anything else as indented JSON.
 */
export function extractJsonPath(body: string, path: string): string {
  let current: unknown = JSON.parse(body);

  for (const segment of parseJsonPath(path)) {
    if (isRecord(current)) {
      if (!Object.prototype.hasOwnProperty.call(current, segment.key)) {
        throw new JsonPathError(`key not found: ${segment.key}`);
      }

      const value = current[segment.key];
      current = segment.index >= 0 ? selectIndex(value, segment.index) : value;
      continue;
    }

    if (Array.isArray(current)) {
      if (segment.index < 0) {
        throw new JsonPathError(`invalid array index: ${segment.index}`);
      }

      current = selectIndex(current, segment.index);
      continue;
    }

    throw new JsonPathError(`cannot traverse into ${current === null ? 'null' : typeof current}`);
  }

  if (typeof current === 'string') {
    return current;
  }

  if (current === null) {
    return 'null';
  }

  return JSON.stringify(current, null, 2);
}
