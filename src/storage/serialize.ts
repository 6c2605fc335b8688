/**
 * Conversion of arbitrary artifact values into JSON-safe structures.
 *
 * Snapshots feed prompts and the inspection API, so this never throws:
 * anything without a natural JSON shape degrades to a string form.
 */

import { safeString } from '../domain/errors';

function describeFunction(fn: Function): string {
  return fn.name ? `[function ${fn.name}]` : '[function anonymous]';
}

// Objects created inside the sandbox have another realm's Object.prototype,
// so "plain" means: no prototype, or a prototype that itself has none.
function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || Object.getPrototypeOf(proto) === null;
}

// Brand checks read the internal slots, so Maps and Sets built in the
// sandbox's realm are recognised too.
function isMap(value: object): boolean {
  try {
    Map.prototype.has.call(value, undefined);
    return true;
  } catch {
    return false;
  }
}

function isSet(value: object): boolean {
  try {
    Set.prototype.has.call(value, undefined);
    return true;
  } catch {
    return false;
  }
}

function hasToJSON(value: object): value is { toJSON: () => unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

function fallbackString(value: object): string {
  try {
    return String(value);
  } catch {
    return `[${value.constructor?.name ?? 'object'}]`;
  }
}

function convertPrimitive(value: unknown): unknown {
  switch (typeof value) {
    case 'number':
      return Number.isFinite(value) ? value : String(value);
    case 'bigint':
    case 'symbol':
      return value.toString();
    case 'function':
      return describeFunction(value);
    case 'undefined':
      return null;
    default:
      return value;
  }
}

function convert(value: unknown, ancestors: Set<object>): unknown {
  if (typeof value !== 'object' || value === null) return convertPrimitive(value);
  const obj = value;

  if (ancestors.has(obj)) return '[Circular]';

  if (obj instanceof Date) {
    return Number.isNaN(obj.getTime()) ? 'Invalid Date' : obj.toISOString();
  }
  if (ArrayBuffer.isView(obj)) {
    const length = 'length' in obj && typeof obj.length === 'number' ? obj.length : obj.byteLength;
    return `[${obj.constructor.name} length=${length}]`;
  }

  ancestors.add(obj);
  try {
    if (Array.isArray(obj)) {
      return obj.map((item) => convert(item, ancestors));
    }
    if (isMap(obj)) {
      const entries: Iterable<[unknown, unknown]> = Map.prototype.entries.call(obj);
      const out: Record<string, unknown> = {};
      for (const [key, item] of entries) {
        out[safeString(key)] = convert(item, ancestors);
      }
      return out;
    }
    if (isSet(obj)) {
      const items: Iterable<unknown> = Set.prototype.values.call(obj);
      return [...items].map((item) => convert(item, ancestors));
    }
    if (hasToJSON(obj)) {
      try {
        return convert(obj.toJSON(), ancestors);
      } catch {
        return fallbackString(obj);
      }
    }
    if (obj instanceof Error) {
      return { name: obj.name, message: obj.message };
    }
    if (!isPlainObject(obj)) {
      return fallbackString(obj);
    }

    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(obj)) {
      if (item === undefined) continue;
      out[key] = convert(item, ancestors);
    }
    return out;
  } finally {
    ancestors.delete(obj);
  }
}

/** Convert any value into a structure JSON.stringify accepts losslessly. */
export function toSerializable(value: unknown): unknown {
  return convert(value, new Set());
}

/** JSON text for a value, truncated to `maxChars` with a marker when longer. */
export function toPreviewText(value: unknown, maxChars?: number): string {
  const text = JSON.stringify(toSerializable(value));
  if (maxChars === undefined || text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}…[truncated ${text.length - maxChars} chars]`;
}
