/**
 * Field mappings: the flat key/value view of a webhook's query string or
 * form body.
 *
 * Keys iterate in the order they first appeared on the wire. A repeated key
 * keeps its first position and its last value.
 */

export type FieldMapping = ReadonlyMap<string, string>;

/**
 * Order of the POST suffix in the canonical URI. `"received"` concatenates
 * fields as they arrived; `"sorted"` orders keys by code unit, which is
 * how Twilio's hosted signer builds the string.
 */
export type FieldOrder = "received" | "sorted";

export function fieldsFromEntries(entries: Iterable<[string, string]>): FieldMapping {
  const fields = new Map<string, string>();
  for (const [key, value] of entries) {
    fields.set(key, value);
  }
  return fields;
}

const compareKeys = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** Same fields, keys in ascending code-unit order. */
export function sortFields(fields: FieldMapping): FieldMapping {
  return new Map([...fields].sort(([a], [b]) => compareKeys(a, b)));
}

/** Decode `a=1&b=two+words&c=%26`; malformed escapes are kept literally. */
export function fieldsFromUrlEncoded(encoded: string | Uint8Array): FieldMapping {
  const text = typeof encoded === "string" ? encoded : Buffer.from(encoded).toString("utf8");
  // URLSearchParams drops a leading "?" from string input; the empty first
  // pair keeps it as part of the key.
  return fieldsFromEntries(new URLSearchParams(`&${text}`));
}

/**
 * Query-string fields of a request target. Anything other than exactly one
 * `?` yields an empty mapping rather than an error.
 */
export function fieldsFromTarget(target: string): FieldMapping {
  const segments = target.split("?");
  if (segments.length !== 2) {
    return new Map();
  }
  return fieldsFromUrlEncoded(segments[1] ?? "");
}

/** `key + value` for every field, in mapping order, with no separators. */
export function concatenateFields(fields: FieldMapping): string {
  let out = "";
  for (const [key, value] of fields) {
    out += key + value;
  }
  return out;
}
