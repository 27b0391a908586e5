import { createHash } from "crypto";

export type FingerprintValue =
  | string
  | number
  | boolean
  | null
  | FingerprintValue[]
  | { [key: string]: FingerprintValue };

// JSON with object keys sorted at every depth, so field order never changes the digest
export function canonicalJson(value: FingerprintValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const keys = Object.keys(value).sort();
    return `{${keys.map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`).join(",")}}`;
  }
  return JSON.stringify(value);
}

export function fingerprint(namespace: string, inputs: { [key: string]: FingerprintValue }): string {
  return createHash("sha256")
    .update(canonicalJson({ namespace, inputs }))
    .digest("hex");
}
