import { describe, expect, it } from "vitest";
import { formatStudyResult } from "../src/formatting.js";

describe("formatStudyResult", () => {
  it("prints the upload id, notes and a numbered quiz", () => {
    const output = formatStudyResult({
      localPath: "input_audio/lecture.mp3",
      notes: "  Notes body\n",
      quiz: [
        { question: "Q1? A) x B) y", answer: "Answer: A" },
        { question: "Q2? A) x B) y", answer: "Answer: B" },
      ],
      upload: { fileId: "drive-file-1", localPath: "input_audio/lecture.mp3", name: "lecture.mp3" },
      failures: [],
    });

    expect(output).toBe(
      [
        "File uploaded to Google Drive with ID: drive-file-1",
        "Lecture notes:",
        "Notes body",
        "Quiz:",
        "1. Q1? A) x B) y",
        "   Answer: A",
        "2. Q2? A) x B) y",
        "   Answer: B",
      ].join("\n"),
    );
  });

  it("reports a plain failure when nothing was generated", () => {
    const output = formatStudyResult({
      localPath: "lecture.mp3",
      failures: [{ stage: "stage", message: "Staging audio failed: 400" }],
    });

    expect(output).toBe("Failed to process audio\n[stage] Staging audio failed: 400");
  });
});
