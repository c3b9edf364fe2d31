import { mkdir, readFile, unlink, writeFile } from "fs/promises";
import path from "path";
import { StorageError, describeError } from "../domain/errors";
import type { ContentStore } from "./contentStore";

const maxNameAttempts = 1000;

export const toSafeFilename = (name: string): string => {
  const safe = name.replace(/[^a-zA-Z0-9._-]+/g, "_").replace(/^_+|_+$/g, "");
  return safe || "resume";
};

const isFileExistsError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "EEXIST";

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

// A taken name becomes `<base>_(<n>)<ext>` with the first free n.
export class LocalContentStore implements ContentStore {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  async put(bytes: Buffer, suggestedName: string): Promise<string> {
    const safeName = toSafeFilename(path.basename(suggestedName));
    const extension = path.extname(safeName);
    const base = safeName.slice(0, safeName.length - extension.length);

    try {
      await mkdir(this.directory, { recursive: true });

      for (let attempt = 0; attempt < maxNameAttempts; attempt += 1) {
        const filename = attempt === 0 ? safeName : `${base}_(${attempt})${extension}`;
        const storedPath = path.join(this.directory, filename);

        try {
          await writeFile(storedPath, bytes, { flag: "wx" });
          return storedPath;
        } catch (error) {
          if (!isFileExistsError(error)) {
            throw error;
          }
        }
      }
    } catch (error) {
      throw new StorageError(`Resume could not be stored: ${describeError(error)}`, error);
    }

    throw new StorageError(`Resume could not be stored: no free file name for ${safeName}`);
  }

  async read(storedPath: string): Promise<Buffer> {
    try {
      return await readFile(this.resolveOwnPath(storedPath));
    } catch (error) {
      throw new StorageError(`Resume could not be read: ${describeError(error)}`, error);
    }
  }

  async delete(storedPath: string): Promise<void> {
    try {
      await unlink(this.resolveOwnPath(storedPath));
    } catch (error) {
      if (isMissingFileError(error)) {
        return;
      }

      throw new StorageError(`Resume could not be deleted: ${describeError(error)}`, error);
    }
  }

  private resolveOwnPath(storedPath: string): string {
    const resolved = path.resolve(storedPath);

    if (path.dirname(resolved) !== this.directory) {
      throw new Error(`${storedPath} is outside the upload directory`);
    }

    return resolved;
  }
}
