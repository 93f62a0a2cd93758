import {
  S3Client,
  CreateBucketCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
  PutBucketWebsiteCommand,
  PutObjectCommand,
  type ListObjectsV2CommandOutput,
  type S3ClientConfig,
} from "@aws-sdk/client-s3";
import type { Config } from "../config";
import { StoreUnavailableError, hasErrorName } from "../errors";
import { createLogger } from "../logger";
import type {
  ListObjectsOptions,
  ObjectListing,
  ObjectStore,
  PutObjectOptions,
} from "./types";

const log = createLogger("s3");

export class S3ObjectStore implements ObjectStore {
  readonly bucket: string;
  private client: S3Client;

  constructor(config: Config["storage"]) {
    this.bucket = config.bucket;

    const clientConfig: S3ClientConfig = {
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: config.forcePathStyle,
    };
    if (config.accessKeyId && config.secretAccessKey) {
      clientConfig.credentials = {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      };
    }
    this.client = new S3Client(clientConfig);
  }

  async listObjects(options: ListObjectsOptions): Promise<ObjectListing> {
    const listing: ObjectListing = { keys: [], prefixes: [] };
    let continuationToken: string | undefined;

    do {
      let response: ListObjectsV2CommandOutput;
      try {
        response = await this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: options.prefix || undefined,
            Delimiter: options.delimiter,
            ContinuationToken: continuationToken,
          })
        );
      } catch (error) {
        if (hasErrorName(error, "NoSuchBucket")) {
          // Nothing has been uploaded yet
          log.debug({ bucket: this.bucket }, "Bucket does not exist, listing as empty");
          return { keys: [], prefixes: [] };
        }
        throw new StoreUnavailableError("list", error);
      }

      for (const object of response.Contents ?? []) {
        if (object.Key) listing.keys.push(object.Key);
      }
      for (const common of response.CommonPrefixes ?? []) {
        if (common.Prefix) listing.prefixes.push(common.Prefix);
      }

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    log.debug(
      { prefix: options.prefix, keys: listing.keys.length, prefixes: listing.prefixes.length },
      "Listed objects"
    );
    return listing;
  }

  async getObject(key: string): Promise<Uint8Array> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key })
      );
      if (!response.Body) {
        return new Uint8Array();
      }
      return await response.Body.transformToByteArray();
    } catch (error) {
      throw new StoreUnavailableError(`get ${key}`, error);
    }
  }

  async putObject(
    key: string,
    body: Uint8Array | string,
    options: PutObjectOptions = {}
  ): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: options.contentType,
        })
      );
    } catch (error) {
      throw new StoreUnavailableError(`put ${key}`, error);
    }
    log.debug({ key }, "Uploaded object");
  }

  async deleteObject(key: string): Promise<void> {
    try {
      // S3 answers 204 for keys that do not exist
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
    } catch (error) {
      throw new StoreUnavailableError(`delete ${key}`, error);
    }
    log.debug({ key }, "Deleted object");
  }

  async ensureBucketExists(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      return;
    } catch (error) {
      if (!hasErrorName(error, "NotFound", "NoSuchBucket")) {
        throw new StoreUnavailableError("head bucket", error);
      }
    }

    try {
      await this.client.send(new CreateBucketCommand({ Bucket: this.bucket }));
      log.info({ bucket: this.bucket }, "Created bucket");
    } catch (error) {
      if (hasErrorName(error, "BucketAlreadyOwnedByYou")) {
        return;
      }
      throw new StoreUnavailableError("create bucket", error);
    }
  }

  async configureStaticWebsite(indexDocument: string): Promise<void> {
    try {
      await this.client.send(
        new PutBucketWebsiteCommand({
          Bucket: this.bucket,
          WebsiteConfiguration: {
            IndexDocument: { Suffix: indexDocument },
          },
        })
      );
    } catch (error) {
      throw new StoreUnavailableError("configure website", error);
    }
  }
}
