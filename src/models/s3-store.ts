/**
 * S3-compatible model store (AWS S3, MinIO)
 *
 * One object per monitor: `<prefix>/<monitorId>/model.json`
 */

import {
	GetObjectCommand,
	PutObjectCommand,
	S3Client,
	S3ServiceException,
	type S3ClientConfig,
} from '@aws-sdk/client-s3';
import type { Logger } from '../logging/logger';
import defaultLogger from '../logging/logger';
import { LogComponents } from '../logging/components';
import { StorageError } from '../inference/errors';
import type { ModelStore } from '../inference/types';

export interface S3ModelStoreOptions {
	bucket: string;
	prefix: string;
	region: string;
	endpoint?: string;
	accessKeyId?: string;
	secretAccessKey?: string;
	forcePathStyle?: boolean;
}

const ARTIFACT_OBJECT = 'model.json';

export function createS3Client(options: S3ModelStoreOptions): S3Client {
	const config: S3ClientConfig = {
		region: options.region,
		endpoint: options.endpoint,
		forcePathStyle: options.forcePathStyle ?? true,
	};
	if (options.accessKeyId && options.secretAccessKey) {
		config.credentials = {
			accessKeyId: options.accessKeyId,
			secretAccessKey: options.secretAccessKey,
		};
	}
	return new S3Client(config);
}

function isNotFound(error: unknown): boolean {
	if (error instanceof S3ServiceException) {
		return error.name === 'NoSuchKey' || error.name === 'NotFound' || error.$metadata.httpStatusCode === 404;
	}
	return false;
}

function isPermanent(error: unknown): boolean {
	if (error instanceof S3ServiceException) {
		const status = error.$metadata.httpStatusCode ?? 0;
		return status === 403 || error.name === 'NoSuchBucket' || error.name === 'AccessDenied';
	}
	return false;
}

export class S3ModelStore implements ModelStore {
	private readonly client: S3Client;
	private readonly bucket: string;
	private readonly prefix: string;
	private readonly logger: Logger;

	constructor(client: S3Client, options: Pick<S3ModelStoreOptions, 'bucket' | 'prefix'>, logger?: Logger) {
		if (!options.bucket) {
			throw new StorageError('S3 model store needs a bucket name', undefined, { transient: false });
		}
		this.client = client;
		this.bucket = options.bucket;
		this.prefix = options.prefix.replace(/^\/+|\/+$/g, '');
		this.logger = logger ?? defaultLogger;
	}

	keyFor(monitorId: string): string {
		const path = `${encodeURIComponent(monitorId)}/${ARTIFACT_OBJECT}`;
		return this.prefix ? `${this.prefix}/${path}` : path;
	}

	async get(monitorId: string): Promise<Buffer | undefined> {
		const key = this.keyFor(monitorId);
		try {
			const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
			if (!response.Body) {
				return undefined;
			}
			const bytes = Buffer.from(await response.Body.transformToByteArray());

			this.logger.debug('Model artifact downloaded', {
				component: LogComponents.MODEL_STORE,
				monitorId,
				key,
				bytes: bytes.length,
			});
			return bytes;
		} catch (error) {
			if (isNotFound(error)) {
				return undefined;
			}
			throw new StorageError(`Failed to read s3://${this.bucket}/${key}`, monitorId, {
				cause: error,
				transient: !isPermanent(error),
			});
		}
	}

	async put(monitorId: string, bytes: Buffer): Promise<void> {
		const key = this.keyFor(monitorId);
		try {
			await this.client.send(new PutObjectCommand({
				Bucket: this.bucket,
				Key: key,
				Body: bytes,
				ContentType: 'application/json',
			}));

			this.logger.info('Model artifact uploaded', {
				component: LogComponents.MODEL_STORE,
				monitorId,
				key,
				bytes: bytes.length,
			});
		} catch (error) {
			throw new StorageError(`Failed to write s3://${this.bucket}/${key}`, monitorId, {
				cause: error,
				transient: !isPermanent(error),
			});
		}
	}
}
