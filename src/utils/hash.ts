import { createHash, randomBytes } from "node:crypto";

export function urlDigest(url: string): string {
  return createHash("sha256").update(url).digest("hex");
}

export function makeJobId(url: string, now: number = Date.now()): string {
  return `${now}-${urlDigest(url).slice(0, 8)}-${randomBytes(4).toString("hex")}`;
}

/** Short id that fits in a button payload. */
export function makeRequestId(): string {
  return randomBytes(4).toString("hex");
}
