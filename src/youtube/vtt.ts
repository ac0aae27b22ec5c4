const HEADER_PREFIXES = ["WEBVTT", "Kind:", "Language:"];
const CUE_START_PATTERN = /^(\d{2}):(\d{2}):(\d{2})/;
const CUE_INDEX_PATTERN = /^\d+$/;
const MARKUP_PATTERN = /<[^>]+>/g;

/** Start of a cue, truncated to whole seconds. */
type CueStart = {
  timestamp: string;
  minute: number;
};

export function parseCueStart(line: string): CueStart | null {
  const match = CUE_START_PATTERN.exec(line);
  if (!match) return null;
  return {
    timestamp: `${match[1]}:${match[2]}:${match[3]}`,
    minute: Number.parseInt(match[2] ?? "0", 10),
  };
}

export function stripMarkup(line: string): string {
  return line.replace(MARKUP_PATTERN, "");
}

/**
 * Turn a WebVTT caption track into readable plain text.
 *
 *  - drops the header, cue indices and timing lines
 *  - strips inline tags (`<c>`, `<b>`, word-level `<00:00:01.000>` timings)
 *  - collapses YouTube's rolling captions, which repeat each line across
 *    two or three overlapping cues, by skipping a line equal to the last one kept
 *  - keeps a `[HH:MM:SS]` marker whenever the minute of the cue start changes
 *
 * The minute comparison ignores the hour, so 00:05:00 followed by 01:05:00
 * gets no second marker.
 */
export function normalizeSubtitles(raw: string): string {
  const out: string[] = [];
  let previousText: string | null = null;
  let lastMinute: number | null = null;

  for (const rawLine of raw.split("\n")) {
    const line = rawLine.trim();
    if (!line || HEADER_PREFIXES.some((prefix) => line.startsWith(prefix))) continue;

    if (line.includes("-->")) {
      const start = parseCueStart(line);
      if (start && start.minute !== lastMinute) {
        out.push(`[${start.timestamp}]`);
        lastMinute = start.minute;
      }
      continue;
    }

    if (CUE_INDEX_PATTERN.test(line)) continue;

    const text = stripMarkup(line);
    if (text.trim() && text !== previousText) {
      out.push(text);
      previousText = text;
    }
  }

  return out.join("\n");
}
