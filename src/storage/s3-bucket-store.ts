import {
  BucketLocationConstraint,
  CreateBucketCommand,
  HeadBucketCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  type CreateBucketCommandInput
} from "@aws-sdk/client-s3";

export const DEFAULT_REGION = "us-east-1";

export function isNotFoundError(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) {
    return false;
  }

  return (
    error.name === "NotFound" ||
    error.name === "NoSuchBucket" ||
    error.$metadata.httpStatusCode === 404
  );
}

function isLocationConstraint(region: string): region is BucketLocationConstraint {
  return Object.values(BucketLocationConstraint).some((value) => value === region);
}

// us-east-1 rejects an explicit LocationConstraint.
export function createBucketInput(bucket: string, region: string): CreateBucketCommandInput {
  if (region === DEFAULT_REGION) {
    return { Bucket: bucket };
  }

  if (!isLocationConstraint(region)) {
    throw new Error(`Unsupported bucket region: ${region} (not a LocationConstraint known to this SDK release)`);
  }

  return {
    Bucket: bucket,
    CreateBucketConfiguration: { LocationConstraint: region }
  };
}

export function withRegionFallback(ambient: () => Promise<string>): () => Promise<string> {
  return async () => {
    try {
      return await ambient();
    } catch {
      // Provider chain has no region configured.
      return DEFAULT_REGION;
    }
  };
}

/** Client on the ambient region chain, falling back to us-east-1 when none is set. */
export function createS3Client(): S3Client {
  const ambient = new S3Client({}).config.region;
  return new S3Client({ region: withRegionFallback(ambient) });
}

export class S3BucketStore {
  constructor(
    readonly bucket: string,
    private readonly client: S3Client = createS3Client()
  ) {}

  /** HeadBucket probe. Resolves false only when S3 reports the bucket missing. */
  async exists(): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      return true;
    } catch (error) {
      if (isNotFoundError(error)) {
        return false;
      }
      throw error;
    }
  }

  async resolveRegion(): Promise<string> {
    return this.client.config.region();
  }

  async create(region: string): Promise<void> {
    await this.client.send(new CreateBucketCommand(createBucketInput(this.bucket, region)));
  }

  async putJson(key: string, document: unknown): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: JSON.stringify(document),
        ContentType: "application/json"
      })
    );
  }
}
