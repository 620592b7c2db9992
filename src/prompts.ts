export const NOTES_INSTRUCTION = `
You are a study assistant listening to a recorded lecture.
Write clear study notes that cover the main topics in the order they were discussed.
Use short headings and bullet points, define new terms, and finish with a brief summary.
`.trim();

export function buildQuizInstruction(questionCount: number): string {
  return `
Create a ${questionCount}-question multiple-choice quiz about this lecture audio.
Output exactly ${questionCount * 2} lines and nothing else:
- A question line containing the question followed by its choices inline, labelled A) B) C) D).
- The next line is the answer to that question, for example "Answer: B) ...".
Do not number the lines, do not add blank commentary, headings or explanations.
  `.trim();
}
