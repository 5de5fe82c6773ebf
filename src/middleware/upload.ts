import multer from 'multer';
import type { RequestHandler } from 'express';

/**
 * Accept a single `image` file part into memory. JSON requests pass through untouched.
 */
export function imageUpload(maxBytes: number): RequestHandler {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxBytes, files: 1 },
  }).single('image');
}
