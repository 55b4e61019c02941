/**
 * Application configuration
 * Centralizes all environment variables with type safety and default values
 */

import dotenv from "dotenv";
import { resolve } from "path";
import { QueueName, QueueNames, isQueueName } from "../../domain/enums/queue.name";
import { SttEngine, isSttEngine } from "../../domain/enums/stt.engine";

// Load environment variables from .env file
dotenv.config();

export interface AppConfig {
  // Server
  port: number;
  mediaRoot: string;

  // MongoDB
  mongodb: {
    uri: string;
    dbName: string;
  };

  // JWT (auth is enabled only when a secret is configured)
  jwt: {
    secret?: string;
  };

  // Speech-to-text
  speech: {
    preferredEngine: SttEngine;
    openaiApiKey?: string;
    whisperModel: string;
    googleApiKey?: string;
    maxAudioDurationSec: number;
  };

  // Background worker
  queue: {
    workerEnabled: boolean;
    concurrency: number;
    queues: QueueName[];
    pollIntervalMs: number;
    resultExpiresMs: number;
  };

  cleanup: {
    tempMaxAgeHours: number;
    taskRetentionDays: number;
  };

  // External binaries
  binaries: {
    ffmpeg: string;
    ffprobe: string;
    soffice: string;
    tar: string;
    sevenZip: string;
  };
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

function parseQueues(value: string | undefined): QueueName[] {
  if (!value) {
    return [...QueueNames];
  }
  const queues = value
    .split(",")
    .map((name) => name.trim())
    .filter(isQueueName);
  return queues.length > 0 ? queues : [...QueueNames];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const preferredEngine = (env.STT_ENGINE || "whisper").trim().toLowerCase();

  return {
    port: parseNumber(env.PORT, 3000),
    mediaRoot: resolve(env.MEDIA_ROOT || "media"),

    mongodb: {
      uri: env.MONGODB_URI || "mongodb://localhost:27017",
      dbName: env.MONGODB_DB_NAME || "media-convert",
    },

    jwt: {
      secret: env.JWT_SECRET || undefined,
    },

    speech: {
      preferredEngine: isSttEngine(preferredEngine) ? preferredEngine : "whisper",
      openaiApiKey: env.OPENAI_API_KEY || undefined,
      whisperModel: env.WHISPER_MODEL || "whisper-1",
      googleApiKey: env.GOOGLE_SPEECH_API_KEY || undefined,
      maxAudioDurationSec: parseNumber(env.AUDIO_MAX_DURATION, 3600),
    },

    queue: {
      workerEnabled: (env.WORKER_ENABLED || "true").toLowerCase() !== "false",
      concurrency: Math.max(1, parseNumber(env.WORKER_CONCURRENCY, 2)),
      queues: parseQueues(env.WORKER_QUEUES),
      pollIntervalMs: parseNumber(env.QUEUE_POLL_INTERVAL_MS, 2000),
      resultExpiresMs: parseNumber(env.QUEUE_RESULT_EXPIRES_MS, 60 * 60 * 1000),
    },

    cleanup: {
      tempMaxAgeHours: parseNumber(env.TEMP_MAX_AGE_HOURS, 24),
      taskRetentionDays: parseNumber(env.TASK_RETENTION_DAYS, 7),
    },

    binaries: {
      ffmpeg: env.FFMPEG_PATH || "ffmpeg",
      ffprobe: env.FFPROBE_PATH || "ffprobe",
      soffice: env.SOFFICE_PATH || "soffice",
      tar: env.TAR_PATH || "tar",
      sevenZip: env.SEVEN_ZIP_PATH || "7z",
    },
  };
}

export const config = loadConfig();
