export type ResponseFormat = 'json' | 'text';

export interface CompletionRequest {
  /** Short label used in logs, e.g. `planner` or `assessment`. */
  purpose: string;
  systemPrompt: string;
  userPrompt: string;
  responseFormat?: ResponseFormat;
  maxTokens?: number;
  temperature?: number;
}

export interface CompletionResponse {
  content: string;
  model: string;
  tokensUsed?: number;
}

export interface LLMService {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
  testConnection(): Promise<boolean>;
}
