import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { spawn } from "node:child_process";
import type { AudioFetcher } from "./audio-fetcher";
import { errorMessage } from "./errors";
import { isRecord, type Segment, type TranscriptionOutput } from "./job";
import type { Logger } from "./logger";
import type { Transcriber } from "./transcriber";

interface WhisperConfig {
  whisperPath: string;
  modelPath: string;
  language: string;
  ffmpegPath: string;
  timeoutSeconds: number;
}

export type CommandRunner = (command: string, args: string[], errPrefix: string, timeoutMs: number) => Promise<void>;

export function runCommand(command: string, args: string[], errPrefix: string, timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { timeout: timeoutMs });

    let stderr = "";
    proc.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    proc.on("error", (err) => {
      reject(new Error(`${errPrefix}: ${err.message}`));
    });

    proc.on("close", (code, signal) => {
      if (signal) {
        reject(new Error(`${errPrefix}: terminated by ${signal}. ${stderr}`.trim()));
        return;
      }
      if (code !== 0) {
        reject(new Error(`${errPrefix}: exit code ${code}. ${stderr}`.trim()));
        return;
      }
      resolve();
    });
  });
}

/** Parses whisper.cpp `-oj` output. Offsets are milliseconds. */
export function parseWhisperJson(raw: string): TranscriptionOutput {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error("Whisper output is not a JSON object.");
  }
  const { transcription, result } = parsed;
  if (!Array.isArray(transcription)) {
    throw new Error("Whisper output has no transcription array.");
  }

  const segments: Segment[] = [];
  for (const entry of transcription) {
    if (!isRecord(entry)) continue;
    const { offsets, text } = entry;
    if (!isRecord(offsets) || typeof text !== "string") continue;
    const { from, to } = offsets;
    if (typeof from !== "number" || typeof to !== "number") continue;

    const trimmed = text.trim();
    if (trimmed.length === 0) continue;
    segments.push({ start: from / 1000, end: to / 1000, text: trimmed });
  }

  const language = isRecord(result) && typeof result.language === "string" ? result.language : "unknown";

  return {
    text: segments.map((segment) => segment.text).join(" "),
    segments,
    language
  };
}

export class WhisperService implements Transcriber {
  constructor(
    private readonly config: WhisperConfig,
    private readonly fetcher: AudioFetcher,
    private readonly logger: Logger,
    private readonly run: CommandRunner = runCommand
  ) {}

  async transcribe(audioPath: string): Promise<TranscriptionOutput> {
    const audio = await this.fetcher.fetch(audioPath);
    const timeoutMs = this.config.timeoutSeconds * 1000;
    let workDir: string | undefined;

    try {
      workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "whisper-job-"));
      const normalizedInput = path.join(workDir, "normalized.wav");
      const outputBase = path.join(workDir, "transcript");

      // mono 16 kHz is what the model expects
      this.logger.info(`Normalizing audio ${audio.localPath}`);
      await this.run(
        this.config.ffmpegPath,
        ["-y", "-i", audio.localPath, "-ac", "1", "-ar", "16000", normalizedInput],
        "Failed to normalize audio with ffmpeg",
        timeoutMs
      );

      const threads = Math.max(1, os.cpus().length);
      this.logger.info(`Running whisper on ${audioPath} (${threads} threads)`);
      await this.run(
        this.config.whisperPath,
        [
          "-m", this.config.modelPath,
          "-l", this.config.language,
          "-t", threads.toString(),
          "-f", normalizedInput,
          "-oj",
          "-of", outputBase
        ],
        "Whisper transcription failed",
        timeoutMs
      );

      const output = parseWhisperJson(await fs.promises.readFile(`${outputBase}.json`, "utf-8"));
      this.logger.info(
        `Transcription completed. Length: ${output.text.length} chars, ` +
          `Segments: ${output.segments.length}, Language: ${output.language}`
      );
      return output;
    } finally {
      if (workDir) {
        const dir = workDir;
        await fs.promises
          .rm(dir, { recursive: true, force: true })
          .catch((err: unknown) => this.logger.warn(`Could not remove ${dir}: ${errorMessage(err)}`));
      }
      await this.fetcher.release(audio);
    }
  }
}
