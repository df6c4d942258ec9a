import type { AgentEngine, EngineRequest, EngineResult, EngineRunOptions } from './types.js';

export class MockEngine implements AgentEngine {
  private readonly turns = new Map<string, number>();

  async run(request: EngineRequest, options: EngineRunOptions): Promise<EngineResult> {
    const trimmed = request.text.trim();
    const turn = (this.turns.get(request.sessionId) ?? 0) + 1;
    this.turns.set(request.sessionId, turn);

    const text = trimmed
      ? `[mock turn ${turn}] You said: "${trimmed.slice(0, 180)}"`
      : 'Received an empty message. Send a concrete request and I will start processing it.';
    options.onChunk?.(text);
    return { status: 'succeeded', text, durationMs: 0 };
  }

  forget(sessionId: string) {
    this.turns.delete(sessionId);
  }

  async ping() {
    return true;
  }
}
