import { copyFile, mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import fg from "fast-glob";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { StoragePort } from "../../core/ports/outboundPorts";

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const storageError = (
  message: string,
  cause: unknown,
  code: AppBoundaryError["code"] = "provider_error",
): AppBoundaryError => ({
  source: "storage",
  code,
  provider: "local",
  message,
  retryable: false,
  cause,
});

const exists = async (path: string): Promise<boolean> => {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isMissingFile(error)) {
      return false;
    }
    throw error;
  }
};

/**
 * Stores objects as files under a root directory; keys map to relative paths.
 */
export class LocalFileStorage implements StoragePort {
  constructor(private readonly root: string) {}

  async uploadFile(
    localPath: string,
    key: string,
    _contentType: string,
  ): Promise<Result<string, AppBoundaryError>> {
    try {
      const target = this.pathFor(key);
      await mkdir(dirname(target), { recursive: true });
      await copyFile(localPath, target);
      return ok(key);
    } catch (error) {
      return err(storageError(`Failed to store ${key}.`, error));
    }
  }

  async putObject(
    key: string,
    body: string | Uint8Array,
    _contentType: string,
  ): Promise<Result<string, AppBoundaryError>> {
    try {
      const target = this.pathFor(key);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, body);
      return ok(key);
    } catch (error) {
      return err(storageError(`Failed to write ${key}.`, error));
    }
  }

  async getObject(key: string): Promise<Result<Uint8Array, AppBoundaryError>> {
    try {
      return ok(new Uint8Array(await readFile(this.pathFor(key))));
    } catch (error) {
      if (isMissingFile(error)) {
        return err(storageError(`Object ${key} does not exist.`, error, "not_found"));
      }
      return err(storageError(`Failed to read ${key}.`, error));
    }
  }

  /**
   * Lists keys under `prefix` in lexical order.
   */
  async listKeys(prefix: string): Promise<Result<string[], AppBoundaryError>> {
    const slash = prefix.lastIndexOf("/");
    const directory = slash >= 0 ? prefix.slice(0, slash) : "";
    const cwd = this.pathFor(directory);

    try {
      if (!(await exists(cwd))) {
        return ok([]);
      }

      const files = await fg("**/*", { cwd, onlyFiles: true, dot: false });
      return ok(
        files
          .map((file) => (directory === "" ? file : `${directory}/${file}`))
          .filter((key) => key.startsWith(prefix))
          .sort(),
      );
    } catch (error) {
      return err(storageError(`Failed to list ${prefix}.`, error));
    }
  }

  private pathFor(key: string): string {
    return join(this.root, ...key.split("/"));
  }
}
