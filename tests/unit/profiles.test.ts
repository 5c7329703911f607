import { describe, expect, it } from "vitest";
import { isQualityProfile, resolveFormatArgs } from "../../src/config/profiles.js";

describe("resolveFormatArgs", () => {
  it("caps the height for resolution profiles", () => {
    expect(resolveFormatArgs("720p")).toEqual({
      format: "bestvideo[height<=720]+bestaudio/best[height<=720]",
      extraArgs: ["--merge-output-format", "mp4"],
    });
  });

  it("extracts mp3 for the audio profile", () => {
    expect(resolveFormatArgs("audio").extraArgs).toEqual(["--extract-audio", "--audio-format", "mp3"]);
  });

  it("prefers a custom format selector over the profile", () => {
    expect(resolveFormatArgs("audio", "22").format).toBe("22");
  });
});

describe("isQualityProfile", () => {
  it("recognises the four profiles only", () => {
    expect(["best", "1080p", "720p", "audio", "4k", ""].map(isQualityProfile)).toEqual([
      true,
      true,
      true,
      true,
      false,
      false,
    ]);
  });
});
