import dotenv from 'dotenv';
import path from 'node:path';
import { z } from 'zod';
import { env, parseIntEnv } from './env.js';
import { ConfigError } from './errors.js';
import { parseLogLevel, type LogLevel } from './logger.js';

export interface RunnerConfig {
  apiKey: string;
  videoEndpoint: string;
  imageBaseUrl: string;
  imageModel: string;
  videoOutputDir: string;
  imageOutputDir: string;
  pendingPlaceholder: string;
  errorPlaceholder: string;
  pollIntervalMs: number;
  pollTimeoutMs: number;
  maxUnclassifiedPolls: number;
  motionBucketId: number;
  httpTimeoutMs: number;
  logLevel: LogLevel;
}

const urlSchema = z.string().url();

/**
 * Reads `.env` and `.env.local` from `cwd` into `process.env` without
 * overriding variables that are already set. Missing files are skipped.
 */
export function loadDotenvFiles(cwd: string = process.cwd()): void {
  dotenv.config({ path: path.resolve(cwd, '.env.local'), override: false });
  dotenv.config({ path: path.resolve(cwd, '.env'), override: false });
}

function urlEnv(name: string, def: string, source: NodeJS.ProcessEnv): string {
  const raw = env(name, source) ?? def;
  const parsed = urlSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(name, `expected an absolute URL, got "${raw}"`);
  }
  return parsed.data.replace(/\/+$/, '');
}

export function loadConfig(
  source: NodeJS.ProcessEnv = process.env,
  opts: { requireApiKey?: boolean; cwd?: string } = {},
): RunnerConfig {
  const cwd = opts.cwd ?? process.cwd();
  const apiKey = env('STABILITY_API_KEY', source) ?? '';
  if (!apiKey && opts.requireApiKey !== false) {
    throw new ConfigError('STABILITY_API_KEY', 'is REQUIRED');
  }

  const motionRaw = env('VIDEO_MOTION_BUCKET_ID', source);
  const motion = z.coerce.number().int().min(1).max(255).safeParse(motionRaw ?? 222);
  if (!motion.success) {
    throw new ConfigError('VIDEO_MOTION_BUCKET_ID', `expected an integer 1..255, got "${motionRaw}"`);
  }

  const rawLevel = env('LOG_LEVEL', source);
  const logLevel = parseLogLevel(rawLevel);
  if (rawLevel && logLevel !== rawLevel.toLowerCase()) {
    throw new ConfigError('LOG_LEVEL', `expected debug, info, warn or error, got "${rawLevel}"`);
  }

  return {
    apiKey,
    videoEndpoint: urlEnv('STABILITY_VIDEO_ENDPOINT', 'https://api.stability.ai/v2beta/image-to-video', source),
    imageBaseUrl: urlEnv('STABILITY_IMAGE_BASE_URL', 'https://api.stability.ai/v2beta/stable-image', source),
    imageModel: env('STABILITY_IMAGE_MODEL', source) ?? 'core',
    videoOutputDir: path.resolve(cwd, env('VIDEO_OUTPUT_DIR', source) ?? 'generated_videos'),
    imageOutputDir: path.resolve(cwd, env('IMAGE_OUTPUT_DIR', source) ?? 'generated_images'),
    pendingPlaceholder: path.resolve(cwd, env('VIDEO_PENDING_PLACEHOLDER', source) ?? 'video_pending.png'),
    errorPlaceholder: path.resolve(cwd, env('VIDEO_ERROR_PLACEHOLDER', source) ?? 'video_error.png'),
    pollIntervalMs: parseIntEnv('VIDEO_POLL_INTERVAL_MS', 11_000, 1_000, 600_000, source),
    pollTimeoutMs: parseIntEnv('VIDEO_POLL_TIMEOUT_MS', 10 * 60_000, 0, 24 * 60 * 60 * 1000, source),
    maxUnclassifiedPolls: parseIntEnv('VIDEO_MAX_UNCLASSIFIED_POLLS', 5, 1, 100, source),
    motionBucketId: motion.data,
    httpTimeoutMs: parseIntEnv('HTTP_TIMEOUT_MS', 60_000, 1_000, 600_000, source),
    logLevel,
  };
}
