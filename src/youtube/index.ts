export { loadYouTubeFragment, buildSourceUrl, DEFAULT_LANGUAGE } from "./service.js";
export type { LoadYouTubeFragmentOptions } from "./service.js";
export { registerFragmentLoaders, youtubeLoader, FRAGMENT_PREFIXES } from "./register.js";
export { parseFragmentArgument } from "./parse-url.js";
export { normalizeSubtitles } from "./vtt.js";
export { createYtDlpFetcher, runCommand } from "./yt-dlp.js";
export type { YtDlpFetcherOptions, RunCommand, CommandOutput } from "./yt-dlp.js";
export { InvalidReferenceError, FetchError, NoSubtitlesError, CommandFailedError } from "./errors.js";
export type {
  CaptionMode,
  CaptionTrackFile,
  Fragment,
  FragmentLoader,
  RegisterFragmentLoader,
  SubtitleFetcher,
  VideoReference,
} from "./types.js";
