import { Injectable, Logger } from '@nestjs/common';
import { DEFAULT_SYSTEM_PROMPT } from './default-system-prompt';
import type { ActivePrompt, PromptSession } from './prompt.types';

@Injectable()
export class PromptService {
  private readonly logger = new Logger(PromptService.name);
  private readonly sessions = new Map<string, PromptSession>();
  private readonly TTL_MS = 30 * 60 * 1000; // 30 minutes

  getActive(sessionId?: string, now = Date.now()): ActivePrompt {
    this.cleanup(now);
    const session = sessionId ? this.sessions.get(sessionId) : undefined;
    if (!session) return { prompt: DEFAULT_SYSTEM_PROMPT, custom: false };

    session.touchedAt = now;
    return { prompt: session.prompt, custom: true };
  }

  /** An edited prompt equal to the default counts as a reset. */
  apply(sessionId: string, prompt: string, now = Date.now()): ActivePrompt {
    if (prompt === DEFAULT_SYSTEM_PROMPT) return this.reset(sessionId);

    this.sessions.set(sessionId, { sessionId, prompt, touchedAt: now });
    this.logger.log(`[${sessionId}] angepasster Systemprompt aktiv`);
    return { prompt, custom: true };
  }

  reset(sessionId: string): ActivePrompt {
    if (this.sessions.delete(sessionId)) {
      this.logger.log(`[${sessionId}] Standard-Prompt wiederhergestellt`);
    }
    return { prompt: DEFAULT_SYSTEM_PROMPT, custom: false };
  }

  private cleanup(now: number): void {
    for (const [id, session] of this.sessions) {
      if (now - session.touchedAt > this.TTL_MS) {
        this.sessions.delete(id);
      }
    }
  }
}
