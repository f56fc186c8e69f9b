import { promises as fs } from "fs";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";

const INTEGER_CELL = /^[+-]?\d+$/;

/**
 * Collects every cell that reads as an integer. Cells are split on commas,
 * tabs and line breaks; anything else is skipped.
 */
export const parseFilterIds = (content: string): Set<number> => {
  const ids = new Set<number>();
  for (const rawCell of content.split(/[,\t\r\n]+/)) {
    const cell = rawCell.trim().replace(/^"(.*)"$/, "$1").trim();
    if (INTEGER_CELL.test(cell)) {
      ids.add(Number.parseInt(cell, 10));
    }
  }
  return ids;
};

export async function loadFilterIds(filePath: string, logger: Logger = silentLogger): Promise<Set<number>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error: unknown) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      logger.warn(`Filter file ${filePath} not found; no taxon filtering applied`);
      return new Set();
    }
    throw error;
  }

  const ids = parseFilterIds(content);
  logger.info(`Loaded ${ids.size} taxon ids from ${filePath}`);
  return ids;
}
