import { describe, expect, it } from "vitest";
import { audioMimeType } from "../../src/utils/audio.js";

describe("audioMimeType", () => {
  it("maps audio extensions regardless of case", () => {
    expect(audioMimeType("input_audio/lecture.mp3")).toBe("audio/mp3");
    expect(audioMimeType("Week 3.M4A")).toBe("audio/mp4");
    expect(audioMimeType("talk.opus")).toBe("audio/ogg");
  });

  it("returns undefined for anything else", () => {
    expect(audioMimeType("notes.txt")).toBeUndefined();
    expect(audioMimeType("lecture")).toBeUndefined();
  });
});
