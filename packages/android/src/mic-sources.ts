import type { AudioSourceChoice, MicSource } from '@adbcam/core';

export interface MicSourceInfo {
  id: MicSource;
  description: string;
}

/**
 * Microphone sources scrcpy can capture from, in menu order
 */
export const MIC_SOURCES: readonly MicSourceInfo[] = [
  { id: 'mic', description: 'Standard microphone' },
  { id: 'mic-unprocessed', description: 'Unprocessed (raw) microphone' },
  { id: 'mic-camcorder', description: 'Microphone tuned for video recording' },
  { id: 'mic-voice-recognition', description: 'Microphone tuned for voice recognition' },
  { id: 'mic-voice-communication', description: 'Microphone tuned for voice communications (voice calls)' },
];

export const DEFAULT_MIC_SOURCE: MicSource = 'mic-camcorder';

export function isAudioSourceChoice(value: string): value is AudioSourceChoice {
  return value === 'none' || MIC_SOURCES.some(source => source.id === value);
}
