import { Router, Request, Response } from 'express';
import multer from 'multer';
import fs from 'node:fs';
import crypto from 'node:crypto';
import path from 'node:path';
import { getConfig } from '../config.js';
import { uploadPath } from '../services/event-report.js';

const router = Router();

const PROTOBUF_MIME_TYPES = new Set(['application/x-protobuf', 'application/protobuf', 'application/octet-stream']);

export function isEventLogUpload(file: { originalname: string; mimetype: string }): boolean {
  if (file.originalname.endsWith('.pb')) return true;
  // Browsers send .pb files as octet-stream; only trust it with no conflicting extension.
  return PROTOBUF_MIME_TYPES.has(file.mimetype) && path.extname(file.originalname) === '';
}

function getUpload() {
  const config = getConfig();
  fs.mkdirSync(config.uploadDir, { recursive: true });

  const storage = multer.diskStorage({
    destination: config.uploadDir,
    filename: (_req, _file, cb) => {
      cb(null, path.basename(uploadPath(config.uploadDir, crypto.randomUUID())));
    },
  });

  return multer({
    storage,
    limits: { fileSize: config.maxFileSize, files: 1 },
    fileFilter: (_req, file, cb) => {
      if (isEventLogUpload(file)) {
        cb(null, true);
      } else {
        cb(new Error('Only .pb critical event logs are accepted'));
      }
    },
  });
}

/**
 * POST /api/upload
 * Store a critical event log for later viewing. Decoding happens on first read.
 * Returns { id, filename, size }.
 */
router.post('/', (req: Request, res: Response) => {
  const upload = getUpload();
  upload.single('file')(req, res, (err: unknown) => {
    if (err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE') {
      return res.status(413).json({ error: `File exceeds ${getConfig().maxFileSize} bytes` });
    }
    if (err) {
      const message = err instanceof Error ? err.message : String(err);
      return res.status(400).json({ error: message });
    }

    if (!req.file) {
      return res.status(400).json({ error: 'No file uploaded' });
    }

    const id = path.basename(req.file.filename, '.pb');
    console.log(`[critical-events] Stored upload ${id} (${req.file.size} bytes)`);

    res.json({
      id,
      filename: req.file.originalname,
      size: req.file.size,
    });
  });
});

export default router;
