import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as Minio from 'minio';
import { AvatarUploadException } from './storage.exceptions';

/**
 * Avatar storage on MinIO (S3-compatible).
 *
 * Object key pattern: avatars/user_{id}. Re-uploading overwrites the
 * previous image, so a user has at most one stored avatar.
 */
@Injectable()
export class StorageService implements OnModuleInit {
  private readonly logger = new Logger(StorageService.name);
  private client!: Minio.Client;
  private readonly bucket: string;
  private readonly publicUrl: string;

  constructor(private readonly configService: ConfigService) {
    this.bucket = this.configService.get<string>(
      'storage.bucket',
      'contacts-avatars',
    );
    this.publicUrl = this.configService.get<string>(
      'storage.publicUrl',
      'http://localhost:9000',
    );
  }

  async onModuleInit(): Promise<void> {
    const endpoint = this.configService.get<string>('storage.endpoint', 'localhost');
    const port = this.configService.get<number>('storage.port', 9000);

    this.client = new Minio.Client({
      endPoint: endpoint,
      port,
      useSSL: this.configService.get<boolean>('storage.useSSL', false),
      accessKey: this.configService.get<string>('storage.accessKey', 'minioadmin'),
      secretKey: this.configService.get<string>('storage.secretKey', 'minioadmin'),
    });

    await this.ensureBucketExists();
    this.logger.log(`StorageService ready: bucket "${this.bucket}" @ ${endpoint}:${port}`);
  }

  /**
   * Stores the avatar of `userId` and returns its public URL.
   *
   * @throws AvatarUploadException on any MinIO error
   */
  async uploadAvatar(userId: number, buffer: Buffer, mimeType: string): Promise<string> {
    const objectKey = StorageService.avatarKey(userId);

    try {
      await this.client.putObject(this.bucket, objectKey, buffer, buffer.length, {
        'Content-Type': mimeType,
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Failed to upload "${objectKey}": ${cause.message}`);
      throw new AvatarUploadException(objectKey, cause);
    }

    this.logger.log(`Uploaded "${objectKey}" (${buffer.length} bytes)`);
    return `${this.publicUrl}/${this.bucket}/${objectKey}`;
  }

  static avatarKey(userId: number): string {
    return `avatars/user_${userId}`;
  }

  private async ensureBucketExists(): Promise<void> {
    try {
      const exists = await this.client.bucketExists(this.bucket);
      if (!exists) {
        await this.client.makeBucket(this.bucket, 'us-east-1');
        this.logger.log(`Created bucket "${this.bucket}"`);
      }
    } catch (error) {
      // Uploads fail with AvatarUploadException until the bucket is reachable.
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to ensure bucket "${this.bucket}" exists: ${message}`);
    }
  }
}
