import { createHash } from "node:crypto";
import path from "node:path";

/** Derived from the absolute path, so an edited file keeps its id. */
export function documentIdFor(filePath: string): string {
  return createHash("sha256").update(path.resolve(filePath)).digest("hex").slice(0, 16);
}
