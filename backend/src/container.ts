import { AudioFetcher } from "./audio-fetcher";
import { CallbackDispatcher } from "./callback.dispatcher";
import type { AppConfig } from "./config";
import { ConfigError } from "./errors";
import type { Logger } from "./logger";
import { PipelineExecutor } from "./pipeline";
import { ExcerptSummarizer, GroqSummarizer, type Summarizer } from "./summarizer";
import { MockTranscriber, type Transcriber } from "./transcriber";
import { WhisperService } from "./whisper.service";

export interface Stages {
  transcriber: Transcriber;
  summarizer: Summarizer;
}

/** Picks the stage implementations once, at worker start-up. */
export function createStages(config: AppConfig, logger: Logger): Stages {
  let transcriber: Transcriber;
  if (config.bypassMode) {
    logger.warn("BYPASS MODE enabled - speech model will not be loaded, mock transcripts only");
    transcriber = new MockTranscriber(logger.child("stt"));
  } else if (config.pipeline.runTranscription) {
    if (!config.whisperModel) {
      throw new ConfigError("WHISPER_MODEL", "required when transcription is enabled");
    }
    const fetcher = new AudioFetcher(
      { downloadDir: config.tempDownloadDir, timeoutSeconds: config.downloadTimeoutSeconds },
      logger.child("audio")
    );
    transcriber = new WhisperService(
      {
        whisperPath: config.whisperPath,
        modelPath: config.whisperModel,
        language: config.whisperLanguage,
        ffmpegPath: config.ffmpegPath,
        timeoutSeconds: config.sttTimeoutSeconds
      },
      fetcher,
      logger.child("stt")
    );
  } else {
    // never called: the executor substitutes the mock transcript itself
    transcriber = new MockTranscriber(logger.child("stt"));
  }

  const summarizer: Summarizer = config.groqApiKey
    ? new GroqSummarizer(
        { apiKey: config.groqApiKey, model: config.groqModel, timeoutSeconds: config.summaryTimeoutSeconds },
        logger.child("summary")
      )
    : new ExcerptSummarizer(logger.child("summary"));

  return { transcriber, summarizer };
}

export function createExecutor(config: AppConfig, logger: Logger, stages = createStages(config, logger)): PipelineExecutor {
  return new PipelineExecutor({
    options: config.pipeline,
    transcriber: stages.transcriber,
    summarizer: stages.summarizer,
    dispatcher: new CallbackDispatcher(config.callback, logger.child("callback")),
    logger: logger.child("pipeline")
  });
}
