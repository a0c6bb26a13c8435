/**
 * Watches scrcpy's output for errors and device loss
 */

import { createInterface } from 'readline';
import type { Readable } from 'stream';

export type OutputLineKind = 'disconnected' | 'error' | 'warning' | 'info';

const ERROR_KEYWORDS = ['ERROR:', 'FATAL:', 'Failed', 'Error', 'Cannot'];

export function classifyOutputLine(line: string): OutputLineKind {
  if (line.includes('WARN:') && line.includes('Device disconnected')) {
    return 'disconnected';
  }
  if (line.includes('Could not find any ADB device')) {
    return 'disconnected';
  }
  if (ERROR_KEYWORDS.some(keyword => line.includes(keyword))) {
    return 'error';
  }
  if (line.includes('WARN:')) {
    return 'warning';
  }
  return 'info';
}

/**
 * Feed every non-empty line of the stream to the callback, classified
 */
export function monitorOutput(
  stream: Readable,
  onLine: (kind: OutputLineKind, line: string) => void
): void {
  const lines = createInterface({ input: stream, crlfDelay: Infinity });

  lines.on('line', (rawLine: string) => {
    const line = rawLine.trim();
    if (line) {
      onLine(classifyOutputLine(line), line);
    }
  });
}
