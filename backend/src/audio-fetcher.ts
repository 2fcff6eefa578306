import fs from "node:fs";
import path from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import axios, { type AxiosInstance } from "axios";
import { v4 as uuidv4 } from "uuid";
import { AudioSourceError, errorMessage } from "./errors";
import type { Logger } from "./logger";

export interface FetchedAudio {
  localPath: string;
  /** Downloaded copy that must be released after use. */
  temporary: boolean;
}

interface AudioFetcherConfig {
  downloadDir: string;
  timeoutSeconds: number;
}

export function isRemoteUrl(audioPath: string): boolean {
  try {
    const { protocol } = new URL(audioPath);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

export function isSmbPath(audioPath: string): boolean {
  return audioPath.startsWith("//") || audioPath.startsWith("\\\\") || audioPath.startsWith("smb://");
}

export class AudioFetcher {
  constructor(
    private readonly config: AudioFetcherConfig,
    private readonly logger: Logger,
    private readonly http: AxiosInstance = axios
  ) {}

  async fetch(audioPath: string): Promise<FetchedAudio> {
    if (isRemoteUrl(audioPath)) {
      return { localPath: await this.download(audioPath), temporary: true };
    }

    if (isSmbPath(audioPath)) {
      throw new AudioSourceError(
        `SMB/CIFS paths are not supported: ${audioPath}. Mount the share locally or provide an HTTP URL.`
      );
    }

    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(audioPath);
    } catch {
      throw new AudioSourceError(`Audio file not found: ${audioPath}`);
    }
    if (!stat.isFile()) {
      throw new AudioSourceError(`Path is not a file: ${audioPath}`);
    }
    return { localPath: audioPath, temporary: false };
  }

  async release(audio: FetchedAudio): Promise<void> {
    if (!audio.temporary) return;
    try {
      await fs.promises.rm(audio.localPath, { force: true });
      this.logger.debug(`Removed downloaded audio ${audio.localPath}`);
    } catch (err) {
      this.logger.warn(`Could not remove downloaded audio ${audio.localPath}: ${errorMessage(err)}`);
    }
  }

  private async download(url: string): Promise<string> {
    await fs.promises.mkdir(this.config.downloadDir, { recursive: true });
    const extension = path.extname(new URL(url).pathname) || ".wav";
    const target = path.join(this.config.downloadDir, `${uuidv4()}${extension}`);

    this.logger.info(`Downloading audio from ${url}`);
    try {
      const response = await this.http.get<Readable>(url, {
        responseType: "stream",
        signal: AbortSignal.timeout(this.config.timeoutSeconds * 1000)
      });
      await pipeline(response.data, fs.createWriteStream(target));
    } catch (err) {
      await fs.promises.rm(target, { force: true });
      throw new AudioSourceError(`Failed to download audio from ${url}: ${errorMessage(err)}`);
    }

    const { size } = await fs.promises.stat(target);
    this.logger.info(`Downloaded ${url} to ${target} (${(size / (1024 * 1024)).toFixed(2)} MB)`);
    return target;
  }
}
