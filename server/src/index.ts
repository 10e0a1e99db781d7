import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import path from 'path';
import { loadConfig, type AppConfig } from './config.js';
import { describeError } from './errors.js';
import { ElevenLabsSpeechService } from './services/elevenlabs.js';
import { GeminiDialogueService } from './services/gemini.js';
import { JsonHistoryRepository } from './services/history-store.js';
import { JobTracker } from './services/job-tracker.js';
import { Wav2LipService } from './services/lip-sync.js';
import { ConversationPipeline } from './services/pipeline.js';
import { OpenAISceneService } from './services/scene-generator.js';
import { PIPELINE_STAGES } from './services/stages.js';
import { FfmpegMediaService, checkFfmpeg } from './services/video-utils.js';
import { createGenerateRouter } from './routes/generate.js';
import { createHistoryRouter } from './routes/history.js';
import { createStatusRouter } from './routes/status.js';
import { createVoicesRouter } from './routes/voices.js';

function boot(): AppConfig {
  try {
    const loaded = loadConfig();
    // Verify ffmpeg is available
    checkFfmpeg();
    console.log('ffmpeg: OK');
    return loaded;
  } catch (err) {
    console.error(describeError(err));
    process.exit(1);
  }
}

const config = boot();

const { credentials, paths } = config;
for (const [name, value] of [
  ['GEMINI_API_KEY', credentials.geminiApiKey],
  ['OPENAI_API_KEY', credentials.openaiApiKey],
  ['ELEVENLABS_API_KEY', credentials.elevenLabsApiKey],
] as const) {
  if (!value) console.warn(`${name} not set; generation requests will fail validation`);
}

const media = new FfmpegMediaService();
const lipSync = new Wav2LipService(paths.modelsDir, config.lipSync);
const speech = new ElevenLabsSpeechService(credentials.elevenLabsApiKey ?? '', media);
const pipeline = new ConversationPipeline(config, {
  dialogue: new GeminiDialogueService(credentials.geminiApiKey ?? '', config.dialogue.model),
  speech,
  images: new OpenAISceneService(credentials.openaiApiKey ?? '', media),
  lipSync,
  media,
});

const tracker = new JobTracker({
  repository: new JsonHistoryRepository(path.join(paths.outputsDir, 'history.json')),
  outputsDir: paths.outputsDir,
  maxConcurrentJobs: config.maxConcurrentJobs,
});
await tracker.init();

const lipSyncStatus = await lipSync.status();
console.log(lipSyncStatus.installed ? 'Wav2Lip: OK' : `Wav2Lip: unavailable (${lipSyncStatus.reason})`);

const app = express();

app.use(cors());
app.use(express.json());

// Routes
app.use(
  '/api/generate',
  createGenerateRouter({ tracker, pipeline, outputsDir: paths.outputsDir, inputsDir: paths.inputsDir }),
);
app.use('/api/status', createStatusRouter(tracker));
app.use('/api/history', createHistoryRouter(tracker));
app.use('/api/voices', createVoicesRouter(speech));
app.use('/outputs', express.static(paths.outputsDir));
app.use('/inputs', express.static(paths.inputsDir));

app.get('/api/steps', (_req, res) => {
  res.json(PIPELINE_STAGES.map(({ index, name, description }) => ({ index, name, description })));
});

// Health check
app.get('/api/health', (_req, res) => {
  res.json({ status: 'ok', lipSync: lipSyncStatus.installed });
});

const server = app.listen(config.port, () => {
  console.log(`Conversation video server running on http://localhost:${config.port}`);
});

function shutdown(signal: string): void {
  console.log(`${signal} received, shutting down`);
  server.close();
  tracker
    .shutdown()
    .then(() => process.exit(0))
    .catch(err => {
      console.error('Shutdown failed:', describeError(err));
      process.exit(1);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
