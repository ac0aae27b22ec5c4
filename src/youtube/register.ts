import type { FragmentLoader, RegisterFragmentLoader } from "./types.js";
import { loadYouTubeFragment } from "./service.js";

export const FRAGMENT_PREFIXES = ["youtube", "yt"] as const;

/**
 * Load YouTube subtitles as a fragment.
 *
 * Examples:
 *  - youtube:dQw4w9WgXcQ
 *  - youtube:https://www.youtube.com/watch?v=dQw4w9WgXcQ
 *  - yt:es:https://youtu.be/dQw4w9WgXcQ
 */
export const youtubeLoader: FragmentLoader = (argument) => loadYouTubeFragment(argument);

/** Host plugin hook: registers the loader under every prefix. */
export function registerFragmentLoaders(register: RegisterFragmentLoader): void {
  for (const prefix of FRAGMENT_PREFIXES) {
    register(prefix, youtubeLoader);
  }
}
