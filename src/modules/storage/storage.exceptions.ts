import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when the object store rejects an avatar upload.
 * Reported as 502 Bad Gateway.
 */
export class AvatarUploadException extends HttpException {
  constructor(objectKey: string, cause: Error) {
    super(
      {
        statusCode: HttpStatus.BAD_GATEWAY,
        error: 'Bad Gateway',
        message: `Failed to upload "${objectKey}" to object storage`,
      },
      HttpStatus.BAD_GATEWAY,
      { cause },
    );
  }
}
