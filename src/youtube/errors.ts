/** The argument could not be resolved to a YouTube video ID. */
export class InvalidReferenceError extends Error {
  constructor(
    message: string,
    readonly argument: string,
  ) {
    super(message);
    this.name = "InvalidReferenceError";
  }
}

/** yt-dlp could not be run, or exited non-zero. */
export class FetchError extends Error {
  constructor(readonly diagnostics: string) {
    super(`Failed to download subtitles: ${diagnostics}`);
    this.name = "FetchError";
  }
}

/** Both manual and auto-generated caption fetches came back empty. */
export class NoSubtitlesError extends Error {
  constructor(
    readonly videoId: string,
    readonly language?: string,
  ) {
    super(
      `No subtitles found for video ${videoId}` + (language ? ` in language ${language}` : ""),
    );
    this.name = "NoSubtitlesError";
  }
}

/** Raised by the command runner; carries the tool's stderr. */
export class CommandFailedError extends Error {
  constructor(
    readonly command: string,
    readonly stderr: string,
    message: string,
  ) {
    super(message);
    this.name = "CommandFailedError";
  }
}
