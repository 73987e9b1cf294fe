/**
 * Provider-neutral chat types shared by the generation engine and the
 * Ollama/OpenAI transport.
 */

export interface JsonSchemaProperty {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description: string;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type ChatMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCall[] }
  | { role: 'tool'; toolCallId: string; name: string; content: string };

/** `auto` lets the model pick at most one tool */
export type ToolChoice = 'auto';

export interface ChatRequest {
  system: string;
  messages: ChatMessage[];
  tools?: ToolDefinition[];
  toolChoice?: ToolChoice;
  temperature: number;
  maxTokens: number;
}

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens';

export interface ChatResponse {
  stopReason: StopReason;
  text: string;
  toolCalls: ToolCall[];
}
