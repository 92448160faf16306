import type { ChatMessage } from "./types.js";

export const SYSTEM_PROMPT =
  "You are a concise, evocative writer describing album-art mood boards. " +
  "Given clustered groups with color palettes and short captions, write a single paragraph (80–140 words) " +
  "that captures the overall vibe. Mention contrasts between groups when relevant. Avoid track lists; " +
  "focus on atmosphere, palette, and era feelings.";

export function buildMessages(boardJson: string, style: string): ChatMessage[] {
  const styleNote = style.trim()
    ? `Write in a ${style.trim()} style.`
    : "Write in a neutral, evocative style.";
  const userPrompt = [
    styleNote,
    "",
    `Input JSON (vibe_board):\n${boardJson}`,
    "",
    "Return only the paragraph, no preamble, no markdown headers.",
  ].join("\n");

  return [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: userPrompt },
  ];
}
