import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import axios from "axios";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AudioFetcher } from "./audio-fetcher";
import { AudioSourceError } from "./errors";
import { createLogger } from "./logger";
import { type CommandRunner, parseWhisperJson, WhisperService } from "./whisper.service";

const logger = createLogger("test", { write: () => undefined });

const whisperJson = JSON.stringify({
  result: { language: "pt" },
  transcription: [
    { timestamps: { from: "00:00:00,000", to: "00:00:02,500" }, offsets: { from: 0, to: 2500 }, text: " Bom dia." },
    { timestamps: { from: "00:00:02,500", to: "00:00:03,000" }, offsets: { from: 2500, to: 3000 }, text: "   " },
    { timestamps: { from: "00:00:03,000", to: "00:00:06,250" }, offsets: { from: 3000, to: 6250 }, text: " Em que posso ajudar? " }
  ]
});

describe("parseWhisperJson", () => {
  it("converts millisecond offsets into trimmed segments", () => {
    expect(parseWhisperJson(whisperJson)).toEqual({
      text: "Bom dia. Em que posso ajudar?",
      segments: [
        { start: 0, end: 2.5, text: "Bom dia." },
        { start: 3, end: 6.25, text: "Em que posso ajudar?" }
      ],
      language: "pt"
    });
  });

  it("rejects output without a transcription array", () => {
    expect(() => parseWhisperJson('{"result":{}}')).toThrow("Whisper output has no transcription array.");
  });

  it("reports an unknown language when none was detected", () => {
    expect(parseWhisperJson('{"transcription":[]}')).toEqual({ text: "", segments: [], language: "unknown" });
  });
});

describe("WhisperService", () => {
  let dir: string;
  let audioFile: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "whisper-test-"));
    audioFile = path.join(dir, "call.wav");
    await fs.promises.writeFile(audioFile, "RIFF");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  function service(run: CommandRunner) {
    const fetcher = new AudioFetcher({ downloadDir: path.join(dir, "downloads"), timeoutSeconds: 5 }, logger);
    return new WhisperService(
      { whisperPath: "whisper-cli", modelPath: "/models/base.bin", language: "auto", ffmpegPath: "ffmpeg", timeoutSeconds: 60 },
      fetcher,
      logger,
      run
    );
  }

  it("normalizes, transcribes and cleans up its work directory", async () => {
    const commands: Array<{ command: string; args: string[]; timeoutMs: number }> = [];
    let outputBase = "";
    const run: CommandRunner = async (command, args, _errPrefix, timeoutMs) => {
      commands.push({ command, args, timeoutMs });
      if (command === "whisper-cli") {
        outputBase = args[args.indexOf("-of") + 1];
        await fs.promises.writeFile(`${outputBase}.json`, whisperJson);
      }
    };

    const output = await service(run).transcribe(audioFile);

    expect(output.text).toBe("Bom dia. Em que posso ajudar?");
    expect(output.language).toBe("pt");
    expect(commands.map((entry) => entry.command)).toEqual(["ffmpeg", "whisper-cli"]);
    expect(commands[0].args.slice(0, 3)).toEqual(["-y", "-i", audioFile]);
    expect(commands[1].args).toEqual(expect.arrayContaining(["-m", "/models/base.bin", "-l", "auto", "-oj"]));
    expect(commands.every((entry) => entry.timeoutMs === 60_000)).toBe(true);
    expect(fs.existsSync(path.dirname(outputBase))).toBe(false);
  });

  it("propagates process failures", async () => {
    const run: CommandRunner = async (command, _args, errPrefix) => {
      if (command === "ffmpeg") throw new Error(`${errPrefix}: exit code 1. Invalid data found`);
    };

    await expect(service(run).transcribe(audioFile)).rejects.toThrow(
      "Failed to normalize audio with ffmpeg: exit code 1. Invalid data found"
    );
  });

  it("fails before running anything when the audio is missing", async () => {
    const commands: string[] = [];
    const run: CommandRunner = async (command) => {
      commands.push(command);
    };

    await expect(service(run).transcribe(path.join(dir, "gone.wav"))).rejects.toBeInstanceOf(AudioSourceError);
    expect(commands).toEqual([]);
  });

  it("removes a downloaded file when the work directory cannot be created", async () => {
    const http = axios.create({
      adapter: async (config) => ({ data: Readable.from([Buffer.from("RIFF")]), status: 200, statusText: "OK", headers: {}, config })
    });
    const downloads = path.join(dir, "downloads");
    const fetcher = new AudioFetcher({ downloadDir: downloads, timeoutSeconds: 5 }, logger, http);
    const commands: string[] = [];
    const whisper = new WhisperService(
      { whisperPath: "whisper-cli", modelPath: "/models/base.bin", language: "auto", ffmpegPath: "ffmpeg", timeoutSeconds: 60 },
      fetcher,
      logger,
      async (command) => {
        commands.push(command);
      }
    );
    vi.spyOn(fs.promises, "mkdtemp").mockRejectedValueOnce(new Error("ENOSPC: no space left on device"));

    await expect(whisper.transcribe("https://files.test/call.wav")).rejects.toThrow("ENOSPC: no space left on device");
    expect(commands).toEqual([]);
    await expect(fs.promises.readdir(downloads)).resolves.toEqual([]);
  });
});
