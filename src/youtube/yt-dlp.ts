import { execFile } from "node:child_process";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CommandFailedError } from "./errors.js";
import { getLoaderEnv } from "./env.js";
import type { CaptionMode, CaptionTrackFile, SubtitleFetcher } from "./types.js";

export type CommandOutput = { stdout: string; stderr: string };

export type RunCommand = (file: string, args: string[]) => Promise<CommandOutput>;

export type YtDlpFetcherOptions = {
  /** yt-dlp executable (otherwise reads YT_DLP_PATH env, then "yt-dlp"). */
  binary?: string;
  /** Command runner; tests inject one so yt-dlp need not be installed. */
  run?: RunCommand;
  /** Parent directory for the per-call scratch directory. Default: OS temp dir. */
  tmpRoot?: string;
};

const MODE_FLAGS: Record<CaptionMode, string> = {
  manual: "--write-sub",
  auto: "--write-auto-sub",
};

/** Run a command without a shell and collect its output. */
export const runCommand: RunCommand = (file, args) =>
  new Promise<CommandOutput>((resolve, reject) => {
    execFile(file, args, (err, stdout, stderr) => {
      if (err) {
        reject(new CommandFailedError(file, stderr, `${file} failed: ${err.message}`));
      } else {
        resolve({ stdout, stderr });
      }
    });
  });

export function buildYtDlpArgs(
  videoId: string,
  language: string,
  mode: CaptionMode,
  outDir: string,
): string[] {
  return [
    "--skip-download",
    MODE_FLAGS[mode],
    "--sub-format",
    "vtt",
    "-o",
    join(outDir, "%(id)s.%(ext)s"),
    "--sub-lang",
    language,
    `https://www.youtube.com/watch?v=${videoId}`,
  ];
}

/**
 * Subtitle fetcher backed by yt-dlp.
 *
 * Every call gets its own scratch directory, which is removed once the
 * tracks are read, whether yt-dlp succeeded or not. Tracks come back sorted
 * by file name.
 */
export function createYtDlpFetcher(opts?: YtDlpFetcherOptions): SubtitleFetcher {
  const binary = opts?.binary ?? getLoaderEnv().ytDlpPath;
  const run = opts?.run ?? runCommand;
  const tmpRoot = opts?.tmpRoot ?? tmpdir();

  return async (videoId, language, mode) => {
    const dir = await mkdtemp(join(tmpRoot, "yt-fragments-"));
    try {
      await run(binary, buildYtDlpArgs(videoId, language, mode, dir));
      return await readCaptionTracks(dir);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  };
}

async function readCaptionTracks(dir: string): Promise<CaptionTrackFile[]> {
  const names = (await readdir(dir)).filter((name) => name.endsWith(".vtt")).sort();

  const tracks: CaptionTrackFile[] = [];
  for (const fileName of names) {
    tracks.push({
      fileName,
      format: "vtt",
      rawText: await readFile(join(dir, fileName), "utf8"),
    });
  }
  return tracks;
}
