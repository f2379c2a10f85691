/**
 * Canonical JSON serialization for self-hashing.
 *
 * Manifest hashes are computed over exactly this form:
 *
 * - object keys sorted by UTF-16 code unit at every depth
 * - array order preserved
 * - `", "` between items and `": "` between a key and its value
 * - every character outside printable ASCII (0x20-0x7E) escaped as a
 *   lowercase `\uXXXX` sequence, so the output is pure ASCII
 * - `undefined` object members dropped, `undefined` array items as `null`
 * - numbers in JavaScript's shortest round-trip form; NaN and infinities
 *   are rejected
 *
 * Manifests written by older tooling hash identically as long as their
 * numbers are integers. Float metadata may not: JavaScript has no separate
 * float type, so a stored `1.0` prints as `1`, and exponents differ
 * (`0.00001` here where older tooling wrote `1e-05`).
 */

/**
 * Value accepted by {@link canonicalize}
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue | undefined };

const NON_ASCII = /[^\x20-\x7e]/g;

function escapeNonAscii(json: string): string {
  return json.replace(NON_ASCII, (char) =>
    `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

function serializeString(value: string): string {
  return escapeNonAscii(JSON.stringify(value));
}

function serializeNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new TypeError(`Cannot canonicalize non-finite number: ${value}`);
  }
  return JSON.stringify(value);
}

/**
 * Serialize a JSON value in canonical form
 */
export function canonicalize(value: JsonValue): string {
  if (value === null) {
    return 'null';
  }

  switch (typeof value) {
    case 'string':
      return serializeString(value);
    case 'number':
      return serializeNumber(value);
    case 'boolean':
      return value ? 'true' : 'false';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalize(item ?? null)).join(', ')}]`;
  }

  const members: string[] = [];
  for (const key of Object.keys(value).sort()) {
    const member = value[key];
    if (member === undefined) continue;
    members.push(`${serializeString(key)}: ${canonicalize(member)}`);
  }
  return `{${members.join(', ')}}`;
}
