import { Agent } from 'node:https';
import { Readable } from 'node:stream';
import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { GetObjectCommandOutput, S3ClientConfig } from '@aws-sdk/client-s3';
import type { StresserConfig } from '../config';
import { logInfo, logWarn } from '../logging';
import type { ObjectBody, ObjectStore } from './types';

export type S3ConnectionConfig = Pick<
  StresserConfig,
  'endpoint' | 'region' | 'bucket' | 'accessKey' | 'secretKey' | 'insecureSkipVerify'
>;

export const buildS3ClientConfig = (config: S3ConnectionConfig): S3ClientConfig => {
  const options: S3ClientConfig = {
    region: config.region,
    endpoint: config.endpoint || undefined,
    // S3-compatible stores (MinIO, Ceph) generally need path-style addressing.
    forcePathStyle: true,
  };
  if (config.accessKey && config.secretKey) {
    options.credentials = {
      accessKeyId: config.accessKey,
      secretAccessKey: config.secretKey,
    };
  }
  if (config.insecureSkipVerify) {
    options.requestHandler = { httpsAgent: new Agent({ rejectUnauthorized: false }) };
  }
  return options;
};

export const createS3Client = (config: S3ConnectionConfig): S3Client => {
  if (config.insecureSkipVerify) {
    logWarn('[s3] TLS certificate verification disabled');
  }
  if (config.accessKey && config.secretKey) {
    logInfo('[s3] using static credentials from configuration');
  } else {
    logInfo('[s3] using default AWS credential chain');
  }
  const client = new S3Client(buildS3ClientConfig(config));
  logInfo('[s3] client created', {
    endpoint: config.endpoint,
    region: config.region,
    bucket: config.bucket,
    accessKey: config.accessKey,
  });
  return client;
};

const toBytes = (chunk: unknown): Uint8Array => {
  if (chunk instanceof Uint8Array) {
    return chunk;
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk);
  }
  throw new Error(`unexpected body chunk of type ${typeof chunk}`);
};

async function* readableChunks(stream: Readable): ObjectBody {
  for await (const chunk of stream) {
    yield toBytes(chunk);
  }
}

async function* blobChunks(blob: Blob): ObjectBody {
  yield new Uint8Array(await blob.arrayBuffer());
}

async function* noChunks(): ObjectBody {}

export const toObjectBody = (body: GetObjectCommandOutput['Body']): ObjectBody => {
  if (body === undefined) {
    return noChunks();
  }
  if (body instanceof Readable) {
    return readableChunks(body);
  }
  if (body instanceof Blob) {
    return blobChunks(body);
  }
  throw new Error('unsupported response body type');
};

export class S3ObjectStore implements ObjectStore {
  private client: S3Client;

  constructor(client: S3Client) {
    this.client = client;
  }

  async get(bucket: string, key: string): Promise<ObjectBody> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    return toObjectBody(response.Body);
  }

  async put(bucket: string, key: string, payload: Uint8Array): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: payload,
        ContentLength: payload.byteLength,
      }),
    );
  }

  close(): void {
    this.client.destroy();
  }
}
