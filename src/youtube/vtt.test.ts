import { describe, expect, it } from "vitest";
import { normalizeSubtitles, parseCueStart, stripMarkup } from "./vtt.js";

// --- Fixtures ---

const MANUAL_VTT = `WEBVTT

1
00:00:00.000 --> 00:00:03.000
This is the first subtitle

2
00:00:04.000 --> 00:00:07.000
This is the second <b>subtitle</b>

3
00:00:08.000 --> 00:00:11.000
This is the third subtitle`;

// Rolling auto-captions: each line shows up again in the next one or two cues.
const AUTO_VTT = `WEBVTT
Kind: captions
Language: en

00:00:00.160 --> 00:00:02.629 align:start position:0%

so<00:00:00.480><c> today</c><00:00:00.799><c> we</c>

00:00:02.629 --> 00:00:02.639 align:start position:0%
so today we


00:00:02.639 --> 00:00:05.269 align:start position:0%
so today we
are<00:00:03.000><c> going</c><00:00:03.400><c> to</c>

00:00:05.269 --> 00:00:05.279 align:start position:0%
are going to

`;

function textLines(output: string): string[] {
  return output.split("\n").filter((line) => !/^\[\d{2}:\d{2}:\d{2}\]$/.test(line));
}

// --- normalizeSubtitles ---

describe("normalizeSubtitles", () => {
  it("cleans a manual track into one marker and three lines", () => {
    expect(normalizeSubtitles(MANUAL_VTT)).toBe(
      [
        "[00:00:00]",
        "This is the first subtitle",
        "This is the second subtitle",
        "This is the third subtitle",
      ].join("\n"),
    );
  });

  it("collapses rolling auto-caption repeats", () => {
    expect(normalizeSubtitles(AUTO_VTT)).toBe("[00:00:00]\nso today we\nare going to");
  });

  it("emits a marker each time the minute changes", () => {
    const vtt = `WEBVTT

00:00:59.000 --> 00:01:00.500
end of the first minute

00:01:00.500 --> 00:01:03.000
start of the second

00:01:30.000 --> 00:01:32.000
still the second

00:02:00.250 --> 00:02:02.000
third minute`;

    expect(normalizeSubtitles(vtt)).toBe(
      [
        "[00:00:59]",
        "end of the first minute",
        "[00:01:00]",
        "start of the second",
        "still the second",
        "[00:02:00]",
        "third minute",
      ].join("\n"),
    );
  });

  it("emits no new marker when only the hour changes", () => {
    const vtt = `WEBVTT

00:05:00.000 --> 00:05:02.000
before

01:05:10.000 --> 01:05:12.000
after`;

    expect(normalizeSubtitles(vtt)).toBe("[00:05:00]\nbefore\nafter");
  });

  it("only suppresses a repeat of the line directly before", () => {
    const vtt = `WEBVTT

00:00:01.000 --> 00:00:02.000
hello

00:00:02.000 --> 00:00:03.000
world

00:00:03.000 --> 00:00:04.000
hello`;

    expect(normalizeSubtitles(vtt)).toBe("[00:00:01]\nhello\nworld\nhello");
  });

  it("compares repeats across a minute marker", () => {
    const vtt = `WEBVTT

00:00:58.000 --> 00:01:01.000
carried over

00:01:01.000 --> 00:01:03.000
carried over`;

    expect(normalizeSubtitles(vtt)).toBe("[00:00:58]\ncarried over\n[00:01:01]");
  });

  it("drops lines that are only markup", () => {
    const vtt = `WEBVTT

00:00:01.000 --> 00:00:02.000
<c.colorE5E5E5></c>
<ruby>漢<rt>kan</rt></ruby>`;

    expect(normalizeSubtitles(vtt)).toBe("[00:00:01]\n漢kan");
  });

  it("skips numeric cue identifiers but keeps text with digits", () => {
    const vtt = `WEBVTT

42
00:00:01.000 --> 00:00:02.000
1984 was a year
2024`;

    expect(normalizeSubtitles(vtt)).toBe("[00:00:01]\n1984 was a year");
  });

  it("handles CRLF line endings", () => {
    const vtt = "WEBVTT\r\n\r\n00:00:01.000 --> 00:00:02.000\r\nfirst\r\nfirst\r\nsecond\r\n";
    expect(normalizeSubtitles(vtt)).toBe("[00:00:01]\nfirst\nsecond");
  });

  it("ignores a timing line it cannot read", () => {
    const vtt = `WEBVTT

1:02.000 --> 1:03.000
short timestamp form`;

    expect(normalizeSubtitles(vtt)).toBe("short timestamp form");
  });

  it("returns an empty string for empty or header-only input", () => {
    expect(normalizeSubtitles("")).toBe("");
    expect(normalizeSubtitles("WEBVTT\nKind: captions\nLanguage: en\n\n")).toBe("");
  });

  it("never leaves tags or adjacent duplicate lines", () => {
    const out = normalizeSubtitles(AUTO_VTT + "\n" + MANUAL_VTT);
    expect(out).not.toMatch(/<[^>]+>/);

    const lines = textLines(out);
    for (let i = 1; i < lines.length; i++) {
      expect(lines[i]).not.toBe(lines[i - 1]);
    }
  });

  it("is deterministic", () => {
    const first = normalizeSubtitles(AUTO_VTT);
    for (let i = 0; i < 5; i++) {
      expect(normalizeSubtitles(AUTO_VTT)).toBe(first);
    }
  });
});

// --- helpers ---

describe("parseCueStart", () => {
  it("truncates the start to whole seconds", () => {
    expect(parseCueStart("01:02:03.999 --> 01:02:05.000")).toEqual({
      timestamp: "01:02:03",
      minute: 2,
    });
  });

  it("returns null without a leading HH:MM:SS", () => {
    expect(parseCueStart("02:03.000 --> 02:05.000")).toBeNull();
  });
});

describe("stripMarkup", () => {
  it("removes every angle-bracket span", () => {
    expect(stripMarkup("<v Roger>a <i>b</i><00:00:01.000> c")).toBe("a b c");
  });

  it("leaves a lone bracket alone", () => {
    expect(stripMarkup("1 < 2")).toBe("1 < 2");
  });
});
