// approvals/components/to-string.ts

/** The string-conversion capability: turns a verified value into final text. */
export type ToString<T = unknown> = (value: T) => string;

function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Map) return Object.fromEntries(value);
  if (value instanceof Set) return Array.from(value);
  return value;
}

function hasOwnToString(value: object): boolean {
  return (
    value.toString !== Object.prototype.toString && value.toString !== Array.prototype.toString
  );
}

/**
 * Strings as is; primitives via String(); dates as ISO-8601; errors as
 * "Name: message"; objects with their own toString() through it; anything
 * else as 2-space JSON (Maps as objects, Sets as arrays).
 * Conversion errors (e.g. a BigInt nested in JSON) propagate.
 */
export const defaultToString: ToString = (value) => {
  if (typeof value === 'string') return value;
  if (typeof value === 'function') return `[Function ${value.name || 'anonymous'}]`;
  if (typeof value !== 'object' || value === null) return String(value);
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  if (hasOwnToString(value)) return value.toString();
  return JSON.stringify(value, jsonReplacer, 2);
};
