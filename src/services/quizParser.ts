import type { QuizItem } from "../types.js";

const LINE_BREAK = /\r\n|\n|\r/;

/**
 * Pairs the non-blank lines of a quiz response as question, answer, question,
 * answer... A trailing line without a partner is dropped.
 *
 * Nothing checks that a "question" line is a question: the pairing relies on
 * the model following the quiz instruction's one-line-each layout.
 */
export function parseQuiz(rawText: string): QuizItem[] {
  const lines = rawText.split(LINE_BREAK).filter((line) => line.trim() !== "");
  const items: QuizItem[] = [];
  for (let i = 0; i + 1 < lines.length; i += 2) {
    items.push({ question: lines[i], answer: lines[i + 1] });
  }
  return items;
}
