import type { IVoiceTranscriber, VoiceTranscription } from '../../domains/ports';
import { TranscriptionError } from '../../application/errors';

/**
 * Stand-in when the host provides no speech recognizer; check-ins continue without voice.
 */
export class UnavailableVoiceTranscriber implements IVoiceTranscriber {
  async transcribe(_clipReference: string): Promise<VoiceTranscription> {
    throw TranscriptionError.recognitionFailed('speech recognition is not available on this host');
  }
}
