import { InvalidReferenceError } from "./errors.js";
import type { VideoReference } from "./types.js";

const WATCH_HOSTS = new Set(["www.youtube.com", "youtube.com"]);
const SHORT_HOST = "youtu.be";

/**
 * Parse a loader argument of the form `[lang:]url-or-id`.
 *
 * Handles:
 *  - dQw4w9WgXcQ
 *  - es:dQw4w9WgXcQ
 *  - https://www.youtube.com/watch?v=ID (also youtube.com)
 *  - https://youtu.be/ID
 *  - any of the URL forms with a `lang:` prefix
 *
 * Throws `InvalidReferenceError` for other hosts or a watch URL without `v`.
 * The language is left unset when no prefix was given.
 */
export function parseFragmentArgument(argument: string): VideoReference {
  let target = argument;
  let language: string | undefined;

  if (argument.includes(":") && !argument.startsWith("http")) {
    const sep = argument.indexOf(":");
    language = argument.slice(0, sep) || undefined;
    target = argument.slice(sep + 1);
  }

  const videoId = resolveVideoId(target);
  if (!videoId) {
    throw new InvalidReferenceError(`Missing YouTube video ID: ${argument}`, argument);
  }

  return language === undefined ? { videoId } : { videoId, language };
}

function resolveVideoId(target: string): string {
  const url = tryParseUrl(target);
  const host = url?.host ?? "";

  if (url && WATCH_HOSTS.has(host)) {
    const v = url.searchParams.get("v");
    if (!v) throw new InvalidReferenceError(`Invalid YouTube URL: ${target}`, target);
    return v;
  }

  if (url && host === SHORT_HOST) {
    return url.pathname.replace(/^\/+/, "").split("/")[0] ?? "";
  }

  if (host) {
    throw new InvalidReferenceError(`Invalid YouTube URL: ${target}`, target);
  }

  // bare ID, possibly with a trailing query or fragment
  return target.split(/[?#]/)[0] ?? "";
}

/** Scheme-relative targets (`//host/path`) are read as https so their host is checked. */
function tryParseUrl(value: string): URL | null {
  try {
    return new URL(value.startsWith("//") ? `https:${value}` : value);
  } catch {
    return null;
  }
}
