import { stat } from "fs/promises";

/**
 * Check if a path exists and is a directory
 */
export async function directoryExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}
