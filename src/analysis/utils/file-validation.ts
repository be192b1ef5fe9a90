import { BadRequestException } from '@nestjs/common';
import { Request } from 'express';
import { REQUEST_MESSAGES } from '../constants/messages';

const ALLOWED_MIME_TYPES = ['image/jpeg', 'image/jpg', 'image/png'];

export const MAX_IMAGE_SIZE = 10 * 1024 * 1024; // 10MB

export const imageFileFilter = (
  req: Request,
  file: Express.Multer.File,
  callback: (error: Error | null, acceptFile: boolean) => void,
) => {
  if (!ALLOWED_MIME_TYPES.includes(file.mimetype)) {
    return callback(
      new BadRequestException(REQUEST_MESSAGES.INVALID_FORMAT),
      false,
    );
  }

  callback(null, true);
};
