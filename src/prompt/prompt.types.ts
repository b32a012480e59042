export interface ActivePrompt {
  prompt: string;
  custom: boolean;
}

export interface PromptSession {
  sessionId: string;
  prompt: string;
  touchedAt: number; // epoch ms
}
