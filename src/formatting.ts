import type { StudyResult } from "./types.js";

export function formatStudyResult(result: StudyResult): string {
  const lines: string[] = [];
  if (result.upload) {
    lines.push(`File uploaded to Google Drive with ID: ${result.upload.fileId}`);
  }
  if (result.notes !== undefined) {
    lines.push("Lecture notes:", result.notes.trim());
  }
  if (result.quiz !== undefined) {
    lines.push("Quiz:");
    result.quiz.forEach((item, index) => {
      lines.push(`${index + 1}. ${item.question}`, `   ${item.answer}`);
    });
  }
  if (result.notes === undefined && result.quiz === undefined) {
    lines.push("Failed to process audio");
  }
  for (const failure of result.failures) {
    lines.push(`[${failure.stage}] ${failure.message}`);
  }
  return lines.join("\n");
}
