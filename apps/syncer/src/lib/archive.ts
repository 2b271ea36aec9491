import { createWriteStream } from "node:fs";
import path from "node:path";
import yazl from "yazl";

/** Regular file, rwxr-xr-x. */
export const ARCHIVE_ENTRY_MODE = 0o100755;

/** Writes one entry per file, named by its basename, in the order given. */
export async function writeArchive(files: string[], archivePath: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const zip = new yazl.ZipFile();
    const out = createWriteStream(archivePath);

    zip.on("error", reject);
    out.on("error", reject).on("close", resolve);
    zip.outputStream.on("error", reject).pipe(out);

    for (const filePath of files) {
      zip.addFile(filePath, path.basename(filePath), { mode: ARCHIVE_ENTRY_MODE });
    }

    zip.end();
  });
}
