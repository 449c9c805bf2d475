import crypto from "node:crypto";
import stableStringify from "json-stable-stringify";

/** Key-sorted, whitespace-free JSON used for content hashing. */
export function canonicalJson(value: unknown): string {
  return stableStringify(value) ?? "null";
}

export function sha256Hex(input: string): string {
  return crypto.createHash("sha256").update(input, "utf8").digest("hex");
}
