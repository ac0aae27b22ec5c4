import type { CaptionMode, CaptionTrackFile, Fragment, SubtitleFetcher, VideoReference } from "./types.js";
import { CommandFailedError, FetchError, NoSubtitlesError } from "./errors.js";
import { getLoaderEnv } from "./env.js";
import { parseFragmentArgument } from "./parse-url.js";
import { normalizeSubtitles } from "./vtt.js";
import { createYtDlpFetcher } from "./yt-dlp.js";

export const DEFAULT_LANGUAGE = "en";

/** Manual captions first; auto-generated only when there are none. */
const CAPTION_MODES: readonly CaptionMode[] = ["manual", "auto"];

export type LoadYouTubeFragmentOptions = {
  /** Override the yt-dlp fetcher (tests). */
  fetcher?: SubtitleFetcher;
};

/**
 * Main entry point: turn `[lang:]url-or-id` into a subtitle fragment.
 *
 * Parses the argument, fetches manual captions (falling back to
 * auto-generated ones), and normalizes the first track found.
 */
export async function loadYouTubeFragment(
  argument: string,
  opts?: LoadYouTubeFragmentOptions,
): Promise<Fragment> {
  const reference = parseFragmentArgument(argument);
  const language = reference.language ?? DEFAULT_LANGUAGE;
  const fetcher = opts?.fetcher ?? createYtDlpFetcher();

  let tracks: CaptionTrackFile[] = [];
  for (const mode of CAPTION_MODES) {
    debug(`fetching ${mode} captions for ${reference.videoId} (${language})`);
    try {
      tracks = await fetcher(reference.videoId, language, mode);
    } catch (err) {
      const diagnostics = describeFetchFailure(err);
      console.error(`[youtube] ${mode} caption fetch failed for ${reference.videoId}:`, diagnostics);
      throw new FetchError(diagnostics);
    }
    if (tracks.length > 0) break;
  }

  const track = tracks[0];
  if (!track) {
    throw new NoSubtitlesError(reference.videoId, reference.language);
  }
  debug(`using ${track.fileName} (${tracks.length} track(s))`);

  return {
    content: normalizeSubtitles(track.rawText),
    source: buildSourceUrl(reference),
  };
}

/** Watch URL, with `cc_lang_pref` only when the caller named a language. */
export function buildSourceUrl(reference: VideoReference): string {
  const url = `https://www.youtube.com/watch?v=${reference.videoId}`;
  return reference.language ? `${url}&cc_lang_pref=${reference.language}` : url;
}

function describeFetchFailure(err: unknown): string {
  if (err instanceof CommandFailedError && err.stderr) return err.stderr;
  return err instanceof Error ? err.message : String(err);
}

function debug(message: string): void {
  if (getLoaderEnv().debug) console.debug(`[youtube] ${message}`);
}
