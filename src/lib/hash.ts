import { createHash } from "node:crypto";
import { canonicalStringify } from "./canonical-json.js";

export function sha256Hex(data: string | Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

export function digestOf(value: unknown): string {
  return sha256Hex(canonicalStringify(value));
}
