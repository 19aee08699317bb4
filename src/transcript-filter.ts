// Gate between the speech-to-text collaborator and the chat path.
// Only recognised speech reaches the escalation controller, so background
// noise never escalates anyone.

export interface TranscriptResult {
  text: string;
  /** Recogniser's probability that the segment contains no speech, 0..1. */
  noSpeechProbability?: number;
}

export const DEFAULT_MAX_NO_SPEECH_PROBABILITY = 0.5;

/** Returns the trimmed utterance, or null if the transcript should be dropped. */
export function acceptTranscript(
  result: TranscriptResult,
  maxNoSpeechProbability: number = DEFAULT_MAX_NO_SPEECH_PROBABILITY,
): string | null {
  const text = result.text.trim();
  if (text.length === 0) return null;
  if (result.noSpeechProbability !== undefined && result.noSpeechProbability >= maxNoSpeechProbability) {
    return null;
  }
  return text;
}
