import { Router, type ErrorRequestHandler, type Router as RouterType } from 'express';
import multer from 'multer';
import path from 'path';
import fs from 'fs';
import fsp from 'fs/promises';
import { v4 as uuid } from 'uuid';
import { describeError } from '../errors.js';
import { GenerateBodySchema } from '../schemas.js';
import { startGenerationJob, type GenerationDeps } from '../services/generation.js';
import type { GenerationRequest } from '../types.js';

const MAX_IMAGE_BYTES = 20 * 1024 * 1024;
const IMAGE_TYPES = ['image/jpeg', 'image/png', 'image/webp'];
const IMAGE_FIELDS = [
  { name: 'portrait_a', maxCount: 1 },
  { name: 'portrait_b', maxCount: 1 },
  { name: 'background', maxCount: 1 },
];

type UploadedFiles = Record<string, Express.Multer.File[] | undefined>;

function uploadedFiles(files: unknown): UploadedFiles {
  if (!files || Array.isArray(files) || typeof files !== 'object') return {};
  const result: UploadedFiles = {};
  for (const field of IMAGE_FIELDS) {
    const value: unknown = Reflect.get(files, field.name);
    if (Array.isArray(value)) result[field.name] = value;
  }
  return result;
}

async function discardUploads(files: UploadedFiles): Promise<void> {
  for (const list of Object.values(files)) {
    for (const file of list ?? []) {
      await fsp.rm(file.path, { force: true });
    }
  }
}

export interface GenerateRouterDeps extends GenerationDeps {
  inputsDir: string;
}

export function createGenerateRouter(deps: GenerateRouterDeps): RouterType {
  fs.mkdirSync(deps.inputsDir, { recursive: true });

  const storage = multer.diskStorage({
    destination: deps.inputsDir,
    filename: (_req, file, cb) => {
      const ext = path.extname(file.originalname) || '.png';
      cb(null, `${uuid()}${ext}`);
    },
  });

  const upload = multer({
    storage,
    limits: { fileSize: MAX_IMAGE_BYTES },
    fileFilter: (_req, file, cb) => {
      if (IMAGE_TYPES.includes(file.mimetype)) {
        cb(null, true);
      } else {
        cb(new Error(`Unsupported file type: ${file.mimetype}`));
      }
    },
  });

  const router: RouterType = Router();

  router.post('/', upload.fields(IMAGE_FIELDS), async (req, res) => {
    const files = uploadedFiles(req.files);
    const portraitA = files.portrait_a?.[0];
    const portraitB = files.portrait_b?.[0];

    if (!portraitA || !portraitB) {
      await discardUploads(files);
      res.status(400).json({ error: 'Both portrait_a and portrait_b images are required' });
      return;
    }

    const body = GenerateBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      await discardUploads(files);
      res.status(400).json({
        error: 'Invalid request',
        issues: body.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
      return;
    }

    const request: GenerationRequest = {
      portraitA: portraitA.path,
      portraitB: portraitB.path,
      scenario: body.data.scenario,
      speakerAName: body.data.speaker_a_name,
      speakerBName: body.data.speaker_b_name,
      voiceA: body.data.voice_a,
      voiceB: body.data.voice_b,
      backgroundPath: files.background?.[0]?.path,
      layout: body.data.layout,
      useLipSync: body.data.use_lip_sync,
    };

    const status = startGenerationJob(deps, request);
    console.log(`Job ${status.id} submitted (${status.state})`);
    res.status(202).json({ jobId: status.id, status });
  });

  // Handle multer errors
  const onUploadError: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (err instanceof multer.MulterError) {
      if (err.code === 'LIMIT_FILE_SIZE') {
        res.status(413).json({ error: 'File too large. Maximum size is 20MB.' });
        return;
      }
      res.status(400).json({ error: err.message });
      return;
    }
    if (err instanceof Error) {
      res.status(400).json({ error: describeError(err) });
      return;
    }
    next(err);
  };
  router.use(onUploadError);

  return router;
}
