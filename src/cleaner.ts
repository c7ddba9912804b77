/**
 * Project Gutenberg boilerplate stripper.
 *
 * Works on the complete text in memory: one forward pass over the lines
 * finds the content range between the START and END markers, then blank
 * lines and repeated spaces are squeezed.
 */

import { collapseRuns, isWhitespace, stripLeading } from './char-rules.js';
import type { ArchiveCleanerConfig } from './types.js';

export const START_MARKERS: readonly string[] = [
  '*** START OF THIS PROJECT GUTENBERG',
  '*** START OF THE PROJECT GUTENBERG'
];

export const END_MARKERS: readonly string[] = [
  '*** END OF THIS PROJECT GUTENBERG',
  '*** END OF THE PROJECT GUTENBERG'
];

export const DEFAULT_ARCHIVE_CONFIG: ArchiveCleanerConfig = Object.freeze({
  startMarkers: START_MARKERS,
  endMarkers: END_MARKERS,
  leadingInvisibles: Object.freeze(['\uFEFF', '\u200B'])
});

export interface ContentRange {
  /** First retained line */
  start: number;
  /** One past the last retained line */
  end: number;
  startMarkerFound: boolean;
  endMarkerFound: boolean;
}

export function removeLeadingJunk(text: string, config: ArchiveCleanerConfig = DEFAULT_ARCHIVE_CONFIG): string {
  return stripLeading(text, (ch: string) => isWhitespace(ch) || config.leadingInvisibles.includes(ch));
}

/**
 * Locate the content lines. A marker line counts as a start when it contains
 * "START" and otherwise as an end when it contains "END"; the scan stops at the
 * first end, even when no start has been seen (start then stays at 0).
 */
export function findContentRange(lines: readonly string[], config: ArchiveCleanerConfig = DEFAULT_ARCHIVE_CONFIG): ContentRange {
  const markers = [...config.startMarkers, ...config.endMarkers];
  const range: ContentRange = {
    start: 0,
    end: lines.length,
    startMarkerFound: false,
    endMarkerFound: false
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!markers.some((marker: string) => line.includes(marker))) continue;

    if (line.includes('START')) {
      range.start = i + 1;
      range.startMarkerFound = true;
    } else if (line.includes('END')) {
      range.end = i;
      range.endMarkerFound = true;
      break;
    }
  }

  return range;
}

export function cleanArchiveText(rawText: string, config: ArchiveCleanerConfig = DEFAULT_ARCHIVE_CONFIG): string {
  const lines = removeLeadingJunk(rawText, config).split('\n');
  const { start, end } = findContentRange(lines, config);

  const kept = lines.slice(start, end).join('\n');
  const squeezedLines = collapseRuns(kept, (ch: string) => ch === '\n', '\n\n', 3);
  const squeezedSpaces = collapseRuns(squeezedLines, (ch: string) => ch === ' ', ' ', 2);

  return squeezedSpaces.trim();
}
