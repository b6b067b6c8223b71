import { readFile } from "fs/promises";
import { TextDecoder } from "node:util";
import { ReadError } from "../errors";

const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Read a file as strict UTF-8 text (a leading BOM is dropped)
 *
 * @throws ReadError when the file is missing, unreadable, or not valid UTF-8
 */
export async function readTextFile(filepath: string): Promise<string> {
  try {
    const buffer = await readFile(filepath);
    return decoder.decode(buffer);
  } catch (error) {
    throw new ReadError(filepath, error);
  }
}
