/** A video ID plus the caption language the caller asked for, if any. */
export type VideoReference = {
  videoId: string;
  /** Only set when the argument carried an explicit `lang:` prefix. */
  language?: string;
};

/** Which kind of captions to ask yt-dlp for. */
export type CaptionMode = "manual" | "auto";

/** One caption track written by the fetcher. */
export type CaptionTrackFile = {
  fileName: string;
  format: "vtt";
  rawText: string;
};

export type SubtitleFetcher = (
  videoId: string,
  language: string,
  mode: CaptionMode,
) => Promise<CaptionTrackFile[]>;

/** Cleaned subtitle text plus the URL it came from. */
export type Fragment = {
  content: string;
  source: string;
};

export type FragmentLoader = (argument: string) => Promise<Fragment>;

export type RegisterFragmentLoader = (prefix: string, loader: FragmentLoader) => void;
