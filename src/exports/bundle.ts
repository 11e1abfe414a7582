import archiver from "archiver";
import { Writable } from "stream";
import type { BundleFile } from "../shared/types.js";

export interface ZipOptions {
  /** zlib compression level, 0-9. */
  level?: number;
}

/**
 * Create a zip bundle from files.
 * Entries are written in the order given; returns the zip as a Buffer.
 */
export async function createZipBundle(
  files: BundleFile[],
  options: ZipOptions = {},
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const writableStream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    });

    const archive = archiver("zip", { zlib: { level: options.level ?? 9 } });

    writableStream.on("finish", () => {
      resolve(Buffer.concat(chunks));
    });

    archive.on("error", (err) => reject(err));
    archive.on("warning", (err) => reject(err));
    archive.pipe(writableStream);

    for (const file of files) {
      archive.append(
        typeof file.content === "string"
          ? Buffer.from(file.content, "utf-8")
          : file.content,
        { name: file.name },
      );
    }

    archive.finalize().catch(reject);
  });
}
