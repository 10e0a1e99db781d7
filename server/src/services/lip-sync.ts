import { execFile } from 'child_process';
import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import type { AppConfig } from '../config.js';
import type { LipSyncRequest, LipSyncService, LipSyncStatus } from './collaborators.js';

const MAX_BUFFER = 16 * 1024 * 1024;

export interface Wav2LipPaths {
  repoDir: string;
  inference: string;
  checkpoint: string;
}

export function wav2LipPaths(modelsDir: string): Wav2LipPaths {
  const repoDir = path.join(modelsDir, 'Wav2Lip');
  return {
    repoDir,
    inference: path.join(repoDir, 'inference.py'),
    checkpoint: path.join(modelsDir, 'wav2lip_gan.pth'),
  };
}

/**
 * Wav2Lip run as a subprocess of the configured interpreter. Batch sizes and
 * resize factor come from config; lower them for small GPUs.
 */
export class Wav2LipService implements LipSyncService {
  private readonly paths: Wav2LipPaths;

  constructor(
    modelsDir: string,
    private readonly options: AppConfig['lipSync'],
  ) {
    this.paths = wav2LipPaths(modelsDir);
  }

  async status(): Promise<LipSyncStatus> {
    if (!fs.existsSync(this.paths.inference)) {
      return { installed: false, reason: `Wav2Lip not installed at ${this.paths.repoDir}` };
    }
    if (!fs.existsSync(this.paths.checkpoint)) {
      return { installed: false, reason: `Wav2Lip checkpoint not found at ${this.paths.checkpoint}` };
    }
    return { installed: true };
  }

  async animate(request: LipSyncRequest): Promise<string> {
    await fsp.mkdir(path.dirname(request.outputPath), { recursive: true });

    const args = [
      this.paths.inference,
      '--checkpoint_path', this.paths.checkpoint,
      '--face', path.resolve(request.portraitPath),
      '--audio', path.resolve(request.audioPath),
      '--outfile', path.resolve(request.outputPath),
      '--wav2lip_batch_size', String(this.options.batchSize),
      '--face_det_batch_size', String(this.options.faceDetBatchSize),
      '--resize_factor', String(this.options.resizeFactor),
      '--nosmooth',
    ];

    await new Promise<void>((resolve, reject) => {
      execFile(
        this.options.pythonBin,
        args,
        {
          cwd: this.paths.repoDir,
          maxBuffer: MAX_BUFFER,
          env: { ...process.env, CUDA_VISIBLE_DEVICES: '0' },
          signal: request.signal,
        },
        (err, _stdout, stderr) => {
          if (err) return reject(new Error(`Wav2Lip failed: ${err.message}\n${stderr.slice(-2000)}`));
          resolve();
        },
      );
    });

    if (!fs.existsSync(request.outputPath)) {
      throw new Error(`Wav2Lip did not create output file: ${request.outputPath}`);
    }
    return request.outputPath;
  }
}
