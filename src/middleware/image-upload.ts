// =============================================================================
// GAZETTE - Image Uploads
//
// Optional hero image (articles) and cover image (newsletters), sent as one
// multipart file field. JPEG, PNG, GIF or WebP, at most 5 MB. Accepted files
// are written under config.uploads.dir with a uuid name and served from
// /media; requests without a multipart body pass through untouched.
// =============================================================================

import fs from 'fs';
import { Request, RequestHandler } from 'express';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import { sendError } from '../routes/handlers';
import { errorMessage, log } from '../utils/log';

const IMAGE_EXTENSIONS = new Map<string, string>([
  ['image/jpeg', '.jpg'],
  ['image/png', '.png'],
  ['image/gif', '.gif'],
  ['image/webp', '.webp'],
]);

/** Stored extension for an accepted image type, null for anything else. */
export function imageExtension(mimetype: string): string | null {
  return IMAGE_EXTENSIONS.get(mimetype) ?? null;
}

class UnsupportedImageType extends Error {
  constructor(readonly mimetype: string) {
    super(`Unsupported image type: ${mimetype}`);
  }
}

const upload = multer({
  storage: multer.diskStorage({
    destination: (_req, _file, cb) => {
      fs.mkdir(config.uploads.dir, { recursive: true }, (err) => cb(err, config.uploads.dir));
    },
    filename: (_req, file, cb) => {
      cb(null, `${uuidv4()}${imageExtension(file.mimetype) ?? ''}`);
    },
  }),
  limits: {
    fileSize: config.uploads.maxImageBytes,
    files: 1,
  },
  fileFilter: (_req, file, cb) => {
    if (imageExtension(file.mimetype)) {
      cb(null, true);
    } else {
      cb(new UnsupportedImageType(file.mimetype));
    }
  },
});

/**
 * Accept at most one image in `field`. A wrong type, an oversized file or a
 * file under another field name answers 400 ValidationFailed for `field`.
 */
export function imageUpload(field: string): RequestHandler {
  const receive = upload.single(field);
  return (req, res, next) => {
    receive(req, res, (err?: unknown) => {
      if (err === undefined || err === null) {
        next();
        return;
      }
      if (err instanceof UnsupportedImageType || err instanceof multer.MulterError) {
        log.debug('Uploads', 'Image refused', { field, error: errorMessage(err) });
        sendError(res, { kind: 'ValidationFailed', field });
        return;
      }
      next(err);
    });
  };
}

/** Remove the file stored for a request whose operation was refused. */
export async function discardUpload(req: Request): Promise<void> {
  if (!req.file) return;
  try {
    await fs.promises.unlink(req.file.path);
  } catch (err) {
    log.warn('Uploads', 'Could not remove refused upload', { path: req.file.path, error: errorMessage(err) });
  }
}
