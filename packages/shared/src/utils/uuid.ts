/**
 * Identifier generation using Node.js crypto.
 */

import { randomUUID } from "node:crypto";

export function generateId(prefix?: string): string {
  const id = randomUUID();
  return prefix ? `${prefix}_${id.replace(/-/g, "").slice(0, 24)}` : id;
}
