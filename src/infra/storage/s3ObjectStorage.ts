import { readFile } from "node:fs/promises";
import {
  GetObjectCommand,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
  paginateListObjectsV2,
} from "@aws-sdk/client-s3";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { StoragePort } from "../../core/ports/outboundPorts";

export type S3StorageConfig = {
  bucket: string;
  region: string;
  endpoint?: string;
  forcePathStyle: boolean;
};

const storageError = (
  message: string,
  cause: unknown,
  code: AppBoundaryError["code"] = "provider_error",
): AppBoundaryError => ({
  source: "storage",
  code,
  provider: "s3",
  message: `${message} ${cause instanceof Error ? cause.message : ""}`.trim(),
  retryable: code !== "not_found",
  cause,
});

/**
 * S3-compatible object storage sink. Credentials come from the SDK's default provider chain.
 */
export class S3ObjectStorage implements StoragePort {
  constructor(
    private readonly bucket: string,
    private readonly client: S3Client,
  ) {}

  static fromConfig(config: S3StorageConfig): S3ObjectStorage {
    if (config.bucket.trim() === "") {
      throw new Error("S3_BUCKET must be set when STORAGE_PROVIDER=s3.");
    }

    return new S3ObjectStorage(
      config.bucket,
      new S3Client({
        region: config.region,
        endpoint: config.endpoint || undefined,
        forcePathStyle: config.forcePathStyle,
      }),
    );
  }

  async uploadFile(
    localPath: string,
    key: string,
    contentType: string,
  ): Promise<Result<string, AppBoundaryError>> {
    let body: Uint8Array;
    try {
      body = new Uint8Array(await readFile(localPath));
    } catch (error) {
      return err(storageError(`Holding file ${localPath} unreadable.`, error));
    }

    return this.putObject(key, body, contentType);
  }

  async putObject(
    key: string,
    body: string | Uint8Array,
    contentType: string,
  ): Promise<Result<string, AppBoundaryError>> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
        }),
      );
      return ok(key);
    } catch (error) {
      return err(storageError(`Upload of s3://${this.bucket}/${key} failed.`, error));
    }
  }

  async getObject(key: string): Promise<Result<Uint8Array, AppBoundaryError>> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
      );

      if (!response.Body) {
        return err(
          storageError(`Empty response body for s3://${this.bucket}/${key}.`, undefined),
        );
      }

      return ok(await response.Body.transformToByteArray());
    } catch (error) {
      if (error instanceof NoSuchKey) {
        return err(
          storageError(`Object s3://${this.bucket}/${key} does not exist.`, error, "not_found"),
        );
      }
      return err(storageError(`Download of s3://${this.bucket}/${key} failed.`, error));
    }
  }

  async listKeys(prefix: string): Promise<Result<string[], AppBoundaryError>> {
    const keys: string[] = [];

    try {
      const pages = paginateListObjectsV2(
        { client: this.client },
        { Bucket: this.bucket, Prefix: prefix },
      );

      for await (const page of pages) {
        (page.Contents ?? []).forEach((object) => {
          if (object.Key) {
            keys.push(object.Key);
          }
        });
      }
    } catch (error) {
      return err(storageError(`Listing s3://${this.bucket}/${prefix} failed.`, error));
    }

    return ok(keys.sort());
  }
}
