import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { GetObjectCommand, NoSuchKey, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { AppError } from "../middleware/error.js";

export interface BlobStore {
  read(container: string, name: string): Promise<string>;
  write(container: string, name: string, content: string, contentType?: string): Promise<void>;
}

export class BlobNotFoundError extends AppError {
  constructor(container: string, name: string) {
    super(`Blob ${container}/${name} was not found`, 404, "blob_not_found");
  }
}

/** Containers are directories below `rootDir`; blob names may contain `/`. */
export class LocalBlobStore implements BlobStore {
  readonly rootDir: string;

  constructor(options: { rootDir: string }) {
    this.rootDir = path.resolve(options.rootDir);
  }

  async read(container: string, name: string): Promise<string> {
    const filePath = this.resolve(container, name);
    try {
      return await readFile(filePath, "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        throw new BlobNotFoundError(container, name);
      }
      throw error;
    }
  }

  async write(container: string, name: string, content: string): Promise<void> {
    const filePath = this.resolve(container, name);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content, "utf-8");
  }

  private resolve(container: string, name: string): string {
    const containerDir = path.resolve(this.rootDir, container);
    const filePath = path.resolve(containerDir, name);
    if (!filePath.startsWith(containerDir + path.sep)) {
      throw new AppError(`Blob name ${name} escapes container ${container}`, 400, "invalid_blob_name");
    }
    return filePath;
  }
}

type S3BlobStoreOptions = {
  bucket: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
};

/** Containers map to key prefixes inside one bucket. */
export class S3BlobStore implements BlobStore {
  readonly bucket: string;

  private readonly client: S3Client;

  constructor(options: S3BlobStoreOptions, client?: S3Client) {
    this.bucket = options.bucket;
    this.client =
      client ??
      new S3Client({
        region: options.region,
        credentials: {
          accessKeyId: options.accessKeyId,
          secretAccessKey: options.secretAccessKey,
        },
      });
  }

  async read(container: string, name: string): Promise<string> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: `${container}/${name}` })
      );
      if (!response.Body) {
        throw new BlobNotFoundError(container, name);
      }
      return await response.Body.transformToString("utf-8");
    } catch (error) {
      if (error instanceof NoSuchKey) {
        throw new BlobNotFoundError(container, name);
      }
      throw error;
    }
  }

  async write(container: string, name: string, content: string, contentType = "application/json"): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: `${container}/${name}`,
        Body: content,
        ContentType: contentType,
      })
    );
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
