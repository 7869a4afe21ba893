import { existsSync } from "fs";
import path from "path";

/**
 * The project's .env file, looked up from the directory of the running module: one level up
 * for src/ and dist/, two for their subfolders such as cli/.
 */
export function findEnvPath(startDir: string): string {
  const candidates = [path.resolve(startDir, "..", ".env"), path.resolve(startDir, "..", "..", ".env")];
  for (const p of candidates) {
    if (existsSync(p)) return p;
  }
  return path.resolve(startDir, "..", ".env");
}
