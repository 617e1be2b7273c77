import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const here = dirname(fileURLToPath(import.meta.url));

export const repoRoot = resolve(here, "..");
export const fixturesRoot = resolve(repoRoot, "fixtures");

export function readFixture(...parts: string[]): string {
  return readFileSync(resolve(fixturesRoot, ...parts), "utf8");
}
