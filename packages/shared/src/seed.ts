import crypto from "node:crypto";

/** Stable, reproducible seed for generated mazes. */
export function deriveSeed(kind: string, salt: string, nonce: string): string {
  return crypto.createHash("sha256").update(`${kind}|${salt}|${nonce}`).digest("hex");
}

/** Content hash of a maze layout (each row length-prefixed). */
export function hashLayout(rows: readonly (readonly number[])[]): string {
  const h = crypto.createHash("sha256");
  h.update(`${rows.length};`);
  for (const row of rows) h.update(`${row.length}:${row.join("")};`);
  return h.digest("hex");
}
