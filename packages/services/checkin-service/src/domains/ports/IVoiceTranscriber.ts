export interface VoiceTranscription {
  text: string;
  confidence: number;
  toneDescriptor: string;
}

/**
 * Speech-to-text over a recorded clip. Fails with TranscriptionError.
 */
export interface IVoiceTranscriber {
  transcribe(clipReference: string): Promise<VoiceTranscription>;
}
