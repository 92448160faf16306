export interface NarrativeProvider {
  readonly name: string;
  summarize(boardJson: string, style: string): Promise<string>;
}

export type ChatMessage = {
  role: "system" | "user";
  content: string;
};
