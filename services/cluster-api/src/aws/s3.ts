import {
  DeleteObjectsCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  PutObjectCommand,
  S3Client
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';

import { AwsClientError, callAws, errorCode, errorMessage } from './errors';
import type { ArtifactStore } from './types';

export const createArtifactStore = (client: S3Client, bucket: string, region: string): ArtifactStore => ({
  bucket,

  async putObject(key, body, contentType) {
    await callAws('put_object', () =>
      client.send(new PutObjectCommand({ Bucket: bucket, Key: key, Body: body, ContentType: contentType }))
    );
  },

  async getObjectText(key) {
    try {
      const response = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      return response.Body ? await response.Body.transformToString('utf-8') : null;
    } catch (error) {
      if (error instanceof NoSuchKey) {
        return null;
      }
      throw new AwsClientError('get_object', errorCode(error), errorMessage(error));
    }
  },

  async presignGetUrl(key, expiresInSeconds) {
    return callAws('presign_get_object', () =>
      getSignedUrl(client, new GetObjectCommand({ Bucket: bucket, Key: key }), { expiresIn: expiresInSeconds })
    );
  },

  async deletePrefix(prefix) {
    let continuationToken: string | undefined;
    do {
      const listed = await callAws('list_objects_v2', () =>
        client.send(new ListObjectsV2Command({ Bucket: bucket, Prefix: prefix, ContinuationToken: continuationToken }))
      );
      const keys = (listed.Contents ?? []).flatMap((entry) => (entry.Key ? [{ Key: entry.Key }] : []));
      if (keys.length > 0) {
        await callAws('delete_objects', () =>
          client.send(new DeleteObjectsCommand({ Bucket: bucket, Delete: { Objects: keys, Quiet: true } }))
        );
      }
      continuationToken = listed.IsTruncated ? listed.NextContinuationToken : undefined;
    } while (continuationToken);
  },

  objectUrl(key) {
    const domain = region.startsWith('cn-') ? 'amazonaws.com.cn' : 'amazonaws.com';
    return `https://${bucket}.s3.${region}.${domain}/${key}`;
  }
});
