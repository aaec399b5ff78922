import { createWriteStream } from "node:fs";
import archiver from "archiver";
import debug from "debug";
import type { Archiver, ArchiveRequest, CollaboratorStatus } from "../types";

const log = debug("distrun:archive");

/**
 * Zips a directory with every entry nested under a single top-level folder
 * (`rootName/`), at the requested deflate level.
 */
export class ZipArchiver implements Archiver {
  async archive(request: ArchiveRequest): Promise<CollaboratorStatus> {
    log("Archiving %s -> %s (level %d)", request.sourceDir, request.outputPath, request.level);
    try {
      await writeZip(request);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log("Archive failed: %s", message);
      return { message, ok: false };
    }
    log("Wrote %s", request.outputPath);
    return { ok: true };
  }
}

async function writeZip(request: ArchiveRequest): Promise<void> {
  const output = createWriteStream(request.outputPath);
  const archive = archiver("zip", { zlib: { level: request.level } });

  const closed = new Promise<void>((resolve, reject) => {
    output.on("close", () => resolve());
    output.on("error", reject);
    archive.on("error", reject);
    // Any warning means a file went missing from the archive.
    archive.on("warning", reject);
  });

  archive.pipe(output);
  archive.directory(request.sourceDir, request.rootName);

  try {
    await Promise.all([closed, archive.finalize()]);
  } catch (error) {
    archive.abort();
    output.destroy();
    throw error;
  }
}
