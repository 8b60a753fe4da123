export type Wire<T> = T extends bigint
  ? string
  : T extends Array<infer Item>
    ? Array<Wire<Item>>
    : T extends object
      ? { [Key in keyof T]: Wire<T[Key]> }
      : T;

export function toWire<T>(value: T): Wire<T>;
export function toWire(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (Array.isArray(value)) {
    return value.map((item) => toWire(item));
  }

  if (value !== null && typeof value === 'object') {
    const converted: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      converted[key] = toWire(item);
    }
    return converted;
  }

  return value;
}

/** Parses an unsigned integer sent as a decimal string or a safe JS integer. */
export function parseUint(raw: unknown): bigint | null {
  if (typeof raw === 'number' && Number.isSafeInteger(raw) && raw >= 0) {
    return BigInt(raw);
  }

  if (typeof raw === 'string' && /^\d+$/.test(raw.trim())) {
    return BigInt(raw.trim());
  }

  return null;
}
