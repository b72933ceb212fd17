import { GetObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { LookupError, toLookupError } from "../errors";
import { ObjectStore } from "../workflow/client";
import { AwsClientConfig } from "./stepFunctions";

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;

  constructor(config: AwsClientConfig = {}, client?: S3Client) {
    this.client =
      client ??
      new S3Client({
        region: config.region,
        endpoint: config.endpoint,
        forcePathStyle: config.endpoint ? true : undefined
      });
  }

  async getObject(bucket: string, key: string): Promise<Uint8Array> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!response.Body) {
        throw new LookupError(`s3://${bucket}/${key} has no body`);
      }
      return await response.Body.transformToByteArray();
    } catch (error) {
      throw toLookupError(error, `GetObject s3://${bucket}/${key}`);
    }
  }
}
