import type { CompletionRequest, CompletionResponse, LLMService } from '../services/llm/LLMService.interface.js';
import { LLMCallError } from '../utils/errors.js';

export type ScriptedReply = string | Error | Record<string, unknown>;
export type Responder = (request: CompletionRequest) => ScriptedReply;

interface Rule {
  purpose: string;
  match?: string;
  respond: Responder;
}

/**
 * Answers completions from scripted rules. The first rule whose purpose
 * matches and whose `match` text occurs in the user prompt wins; objects are
 * sent back as JSON and errors are thrown.
 */
export class FakeLLMService implements LLMService {
  readonly calls: CompletionRequest[] = [];
  private readonly rules: Rule[] = [];

  on(purpose: string, reply: ScriptedReply, match?: string): this {
    return this.respond(purpose, () => reply, match);
  }

  respond(purpose: string, respond: Responder, match?: string): this {
    this.rules.push({ purpose, match, respond });
    return this;
  }

  callsFor(purpose: string): CompletionRequest[] {
    return this.calls.filter(call => call.purpose === purpose);
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.calls.push(request);

    const rule = this.rules.find(
      candidate =>
        candidate.purpose === request.purpose &&
        (candidate.match === undefined || request.userPrompt.includes(candidate.match))
    );
    if (!rule) {
      throw new LLMCallError(`No scripted reply for ${request.purpose}`);
    }

    const reply = rule.respond(request);
    if (reply instanceof Error) throw reply;

    return {
      content: typeof reply === 'string' ? reply : JSON.stringify(reply),
      model: 'fake-model',
    };
  }

  async testConnection(): Promise<boolean> {
    return true;
  }
}
