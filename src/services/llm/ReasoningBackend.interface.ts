import type { DocumentType } from '../../domain/documents/DocumentType.js';

export interface ReasoningRequest {
  documentType: DocumentType;
  systemPrompt: string;
  userPrompt: string;
}

export interface ReasoningResponse {
  /** Free text; the engine owns parsing. */
  text: string;
  metadata: {
    modelUsed: string;
    timestamp: string;
    tokensUsed?: number;
  };
}

export interface ReasoningBackend {
  readonly name: string;
  complete(request: ReasoningRequest, signal: AbortSignal): Promise<ReasoningResponse>;
  testConnection(): Promise<boolean>;
}
