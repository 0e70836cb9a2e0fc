import { readdir } from "node:fs/promises";
import path from "node:path";

export const ROUND_FILE_PATTERN = /^(\d+)_round\.json$/;

export function roundsFromFileName(fileName: string): number {
  const match = ROUND_FILE_PATTERN.exec(fileName);
  return match?.[1] ? Number.parseInt(match[1], 10) : 0;
}

/** Every `*_round.json` below `root`, sorted by path. */
export async function findRoundFiles(root: string): Promise<string[]> {
  const found: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && ROUND_FILE_PATTERN.test(entry.name)) {
        found.push(fullPath);
      }
    }
  };
  await walk(root);
  return found.sort((a, b) => a.localeCompare(b));
}

export function toPosixPath(value: string): string {
  return value.split(path.sep).join("/").replace(/\\/g, "/");
}
