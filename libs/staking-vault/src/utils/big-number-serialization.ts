// Usage:
// JSON.stringify(object, bigIntReplacer);
// JSON.parse(string, bigIntReviver);

export function bigIntReplacer(key: string, value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString() + "n";
  }
  return value;
}

export function bigIntReviver(key: string, value: unknown): unknown {
  if (typeof value === "string" && /^\d+n$/.test(value)) {
    return BigInt(value.slice(0, -1));
  }
  return value;
}

/** Replaces bigints with their decimal string representation, for JSON responses. */
export function bigIntToDecimalString(data: unknown): unknown {
  if (typeof data === "bigint") {
    return data.toString();
  }
  if (Array.isArray(data)) {
    return data.map(item => bigIntToDecimalString(item));
  }
  if (data !== null && typeof data === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      result[key] = bigIntToDecimalString(value);
    }
    return result;
  }
  return data;
}
