import os from "node:os";
import path from "node:path";
import { ConfigError } from "./errors";

type Env = Record<string, string | undefined>;

export interface PipelineOptions {
  readonly runTranscription: boolean;
  readonly runSummarization: boolean;
  readonly runCallback: boolean;
  readonly defaultCallbackUrl?: string;
}

export interface CallbackOptions {
  readonly timeoutSeconds: number;
  readonly retryCount: number;
  readonly retryDelaySeconds: number;
}

export interface AppConfig {
  readonly port: number;
  readonly redisUrl: string;
  readonly queueName: string;
  readonly dequeueTimeoutSeconds: number;
  readonly queueRetryDelaySeconds: number;
  readonly queueRetryMaxDelaySeconds: number;
  readonly pipeline: PipelineOptions;
  readonly callback: CallbackOptions;
  readonly bypassMode: boolean;
  readonly bypassLogFile: string;
  readonly whisperPath: string;
  readonly whisperModel?: string;
  readonly whisperLanguage: string;
  readonly ffmpegPath: string;
  readonly sttTimeoutSeconds: number;
  readonly groqApiKey?: string;
  readonly groqModel: string;
  readonly summaryTimeoutSeconds: number;
  readonly tempDownloadDir: string;
  readonly downloadTimeoutSeconds: number;
}

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  const normalized = raw.toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new ConfigError(name, `expected a boolean, got "${raw}"`);
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(name, `expected a non-negative number, got "${raw}"`);
  }
  return value;
}

function readPositiveNumber(env: Env, name: string, fallback: number): number {
  const value = readNumber(env, name, fallback);
  if (value === 0) {
    throw new ConfigError(name, `expected a positive number, got "${value}"`);
  }
  return value;
}

function readInteger(env: Env, name: string, fallback: number): number {
  const value = readNumber(env, name, fallback);
  if (!Number.isInteger(value)) {
    throw new ConfigError(name, `expected an integer, got "${value}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return Object.freeze({
    port: readInteger(env, "PORT", 3001),
    redisUrl: readString(env, "REDIS_URL") ?? "redis://localhost:6379/0",
    queueName: readString(env, "QUEUE_NAME") ?? "transcription_jobs",
    dequeueTimeoutSeconds: readPositiveNumber(env, "DEQUEUE_TIMEOUT_SECONDS", 5),
    queueRetryDelaySeconds: readNumber(env, "QUEUE_RETRY_DELAY_SECONDS", 2),
    queueRetryMaxDelaySeconds: readNumber(env, "QUEUE_RETRY_MAX_DELAY_SECONDS", 30),
    pipeline: Object.freeze({
      runTranscription: readBoolean(env, "ENABLE_STT", true),
      runSummarization: readBoolean(env, "ENABLE_SUMMARIZATION", true),
      runCallback: readBoolean(env, "ENABLE_CALLBACK", true),
      defaultCallbackUrl: readString(env, "DEFAULT_CALLBACK_URL")
    }),
    callback: Object.freeze({
      timeoutSeconds: readNumber(env, "CALLBACK_TIMEOUT_SECONDS", 30),
      retryCount: readInteger(env, "CALLBACK_RETRY_COUNT", 3),
      retryDelaySeconds: readNumber(env, "CALLBACK_RETRY_DELAY_SECONDS", 3)
    }),
    bypassMode: readBoolean(env, "BYPASS_MODE", false),
    bypassLogFile: path.resolve(readString(env, "BYPASS_LOG_FILE") ?? "bypass_output.log"),
    whisperPath: readString(env, "WHISPER_PATH") ?? "whisper-cli",
    whisperModel: readString(env, "WHISPER_MODEL"),
    whisperLanguage: readString(env, "WHISPER_LANGUAGE") ?? "auto",
    ffmpegPath: readString(env, "FFMPEG_PATH") ?? "ffmpeg",
    sttTimeoutSeconds: readNumber(env, "STT_TIMEOUT_SECONDS", 3600),
    groqApiKey: readString(env, "GROQ_API_KEY"),
    groqModel: readString(env, "GROQ_MODEL") ?? "llama-3.1-8b-instant",
    summaryTimeoutSeconds: readNumber(env, "SUMMARY_TIMEOUT_SECONDS", 60),
    tempDownloadDir: readString(env, "TEMP_DOWNLOAD_DIR") ?? path.join(os.tmpdir(), "audio_downloads"),
    downloadTimeoutSeconds: readNumber(env, "DOWNLOAD_TIMEOUT_SECONDS", 300)
  });
}
