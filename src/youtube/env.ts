/** Env var lookup. Never logs actual values. */

function optional(name: string): string | undefined {
  return process.env[name] || undefined;
}

export type LoaderEnv = {
  /** yt-dlp executable name or path. */
  ytDlpPath: string;
  debug: boolean;
};

export function getLoaderEnv(): LoaderEnv {
  return {
    ytDlpPath: optional("YT_DLP_PATH") ?? "yt-dlp",
    debug: optional("YOUTUBE_FRAGMENTS_DEBUG") === "1",
  };
}
