import { writeFile, mkdir } from "fs/promises";
import { dirname } from "node:path";
import { WriteError } from "../errors";

/**
 * Write text to a file
 * Creates the parent directory if it doesn't exist
 *
 * @throws WriteError when the directory or file cannot be created or written
 */
export async function writeTextFile(
  filepath: string,
  content: string,
): Promise<void> {
  try {
    await mkdir(dirname(filepath), { recursive: true });
    await writeFile(filepath, content, "utf-8");
  } catch (error) {
    throw new WriteError(filepath, error);
  }
}
