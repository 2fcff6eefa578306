import type { Segment, TranscriptionOutput } from "./job";
import type { Logger } from "./logger";

export interface Transcriber {
  transcribe(audioPath: string): Promise<TranscriptionOutput>;
}

export const MOCK_TRANSCRIPT =
  "This is a test transcription. " +
  "The audio file has been processed in testing mode. " +
  "No actual STT was performed. " +
  "This is dummy data for E2E pipeline testing.";

export const MOCK_LANGUAGE = "en";

const MOCK_SEGMENTS: readonly Segment[] = [
  { start: 0.0, end: 3.5, text: "This is a test transcription." },
  { start: 3.5, end: 7.2, text: "The audio file has been processed in testing mode." },
  { start: 7.2, end: 10.8, text: "No actual STT was performed." },
  { start: 10.8, end: 15.0, text: "This is dummy data for E2E pipeline testing." }
];

/** Fresh copy every time, so no caller can alter the fixture. */
export function mockTranscription(): TranscriptionOutput {
  return {
    text: MOCK_TRANSCRIPT,
    segments: MOCK_SEGMENTS.map((segment) => ({ ...segment })),
    language: MOCK_LANGUAGE
  };
}

/** Stands in for the speech model in bypass mode. Never touches the audio. */
export class MockTranscriber implements Transcriber {
  constructor(private readonly logger: Logger) {}

  async transcribe(audioPath: string): Promise<TranscriptionOutput> {
    this.logger.info(`STT processed (BYPASS MODE): ${audioPath}`);
    const output = mockTranscription();
    this.logger.info(
      `Mock STT complete - Text length: ${output.text.length} chars, ` +
        `Segments: ${output.segments.length}, Language: ${output.language}`
    );
    return output;
  }
}
