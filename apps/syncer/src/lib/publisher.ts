import { copyFile, rename, rm } from "node:fs/promises";
import { errorMessage } from "./errors";
import { logDebug } from "./logger";

/**
 * Moves a finished archive into the output tree. finalPath only ever appears through a rename
 * of a complete file: across devices the copy lands on a sibling ".part" path first.
 */
export async function publishArchive(tempArchive: string, finalPath: string): Promise<void> {
  try {
    await rename(tempArchive, finalPath);
    return;
  } catch (error) {
    logDebug(`rename into place failed for ${finalPath}, copying instead: ${errorMessage(error)}`);
  }

  const partPath = `${finalPath}.part`;
  try {
    await copyFile(tempArchive, partPath);
    await rename(partPath, finalPath);
  } catch (error) {
    await rm(partPath, { force: true });
    throw error;
  }
}
