import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { AxiosError, isAxiosError } from 'axios';
import { LlmConfig } from '../../config/llm.config';
import { errorMessage, isRecord } from '../../common/utils/guards';
import {
  ChatMessage,
  ChatRequest,
  ChatResponse,
  StopReason,
  ToolCall,
  ToolDefinition,
} from './llm.types';

export interface OllamaModel {
  name: string;
  size: number;
  modified_at: string;
}

interface WireTool {
  type: 'function';
  function: ToolDefinition;
}

interface OllamaToolCall {
  function: { name: string; arguments: Record<string, unknown> };
}

interface OllamaChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  tool_calls?: OllamaToolCall[];
  tool_name?: string;
}

interface OllamaChatResponse {
  model: string;
  message?: OllamaChatMessage;
  done_reason?: string;
}

interface OpenAIToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

type OpenAIChatMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: OpenAIToolCall[] }
  | { role: 'tool'; tool_call_id: string; content: string };

interface OpenAIChatResponse {
  choices?: Array<{
    message?: { content?: string | null; tool_calls?: OpenAIToolCall[] };
    finish_reason?: string;
  }>;
}

@Injectable()
export class OllamaService implements OnModuleInit {
  private readonly logger = new Logger(OllamaService.name);
  private readonly config: LlmConfig;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    this.config = this.configService.getOrThrow<LlmConfig>('llm');

    if (this.config.useOpenAI) {
      this.logger.log('🔵 OpenAI mode enabled - using GPT for chat');
      if (!this.config.openAIApiKey) {
        this.logger.warn('⚠ USE_OPENAI=1 but OPENAI_API_KEY is not set!');
      }
    }
  }

  /**
   * Initialize and check Ollama health on module startup
   */
  async onModuleInit() {
    const isHealthy = await this.checkHealth();
    if (isHealthy) {
      await this.validateRequiredModels();
    }
  }

  /**
   * Check if Ollama service is running
   */
  async checkHealth(): Promise<boolean> {
    try {
      this.logger.debug(
        `🔍 Checking Ollama health at ${this.config.ollamaUrl}...`,
      );

      const response = await firstValueFrom(
        this.httpService.get<{ version?: string }>(
          `${this.config.ollamaUrl}/api/version`,
          { timeout: 5000 },
        ),
      );

      this.logger.log(
        `✓ Ollama service is healthy (version: ${response.data.version || 'unknown'})`,
      );
      return true;
    } catch (error) {
      this.logger.error(
        `✗ Ollama service is not accessible: ${errorMessage(error)}`,
      );

      if (process.env.NODE_ENV === 'development') {
        this.logger.warn('⚠ Make sure Ollama is running: ollama serve');
      }

      return false;
    }
  }

  /**
   * List all available models
   */
  async listModels(): Promise<string[]> {
    try {
      const response = await firstValueFrom(
        this.httpService.get<{ models?: OllamaModel[] }>(
          `${this.config.ollamaUrl}/api/tags`,
          { timeout: 10000 },
        ),
      );

      const modelNames = (response.data.models || []).map(
        (model) => model.name,
      );

      this.logger.log(
        `Found ${modelNames.length} models: ${modelNames.join(', ')}`,
      );

      return modelNames;
    } catch (error) {
      this.logger.error(`Failed to list models: ${errorMessage(error)}`);
      return [];
    }
  }

  private async validateRequiredModels(): Promise<void> {
    const models = await this.listModels();

    const requiredModels = [this.config.embeddingModel];
    if (!this.config.useOpenAI) {
      requiredModels.push(this.config.chatModel);
    }
    const missingModels = requiredModels.filter(
      (model) => !models.some((m) => m.includes(model.split(':')[0])),
    );

    if (missingModels.length > 0) {
      this.logger.warn(
        `⚠ Missing required models: ${missingModels.join(', ')}. ` +
          `Pull them with: ollama pull ${missingModels.join(' && ollama pull ')}`,
      );
    } else {
      this.logger.log(`✓ All required models are available`);
    }
  }

  /**
   * Generate embedding for a single text
   */
  async generateEmbedding(text: string): Promise<number[]> {
    const model = this.config.embeddingModel;

    try {
      this.logger.debug(
        `Generating embedding for text (${text.length} chars) with model ${model}`,
      );

      const response = await this.retryRequest(
        () =>
          firstValueFrom(
            this.httpService.post<{ embedding?: number[] }>(
              `${this.config.ollamaUrl}/api/embeddings`,
              { model, prompt: text },
              { timeout: this.config.embeddingTimeout },
            ),
          ),
        3,
      );

      const embedding = response.data.embedding;

      if (!embedding || !Array.isArray(embedding)) {
        throw new Error('Invalid embedding response format');
      }

      this.logger.debug(
        `✓ Generated embedding with ${embedding.length} dimensions`,
      );

      return embedding;
    } catch (error) {
      this.logger.error(`Failed to generate embedding: ${errorMessage(error)}`);

      if (this.isAxiosError(error) && error.response?.status === 404) {
        throw new Error(
          `Model "${model}" not found. Pull it with: ollama pull ${model}`,
        );
      }

      throw error;
    }
  }

  /**
   * One chat round with optional tool definitions. Single attempt: callers
   * decide what a failure means for the conversation.
   */
  async chat(request: ChatRequest): Promise<ChatResponse> {
    if (this.config.useOpenAI) {
      return this.chatOpenAI(request);
    }

    const model = this.config.chatModel;

    try {
      this.logger.debug(
        `Chat with model ${model} (${request.messages.length} messages, ${request.tools?.length ?? 0} tools)`,
      );

      const messages: OllamaChatMessage[] = [
        { role: 'system', content: request.system },
        ...request.messages.map((m) => this.toOllamaMessage(m)),
      ];

      const useTools = !!request.tools?.length;

      const response = await firstValueFrom(
        this.httpService.post<OllamaChatResponse>(
          `${this.config.ollamaUrl}/api/chat`,
          {
            model,
            messages,
            tools: useTools ? request.tools?.map(toWireTool) : undefined,
            stream: false,
            options: {
              temperature: request.temperature,
              num_predict: request.maxTokens,
            },
          },
          { timeout: this.config.completionTimeout },
        ),
      );

      const message = response.data.message;
      if (!message) {
        throw new Error('Invalid chat response format');
      }

      const toolCalls: ToolCall[] = (message.tool_calls || []).map(
        (call, idx) => ({
          id: `call_${idx}`,
          name: call.function.name,
          arguments: isRecord(call.function.arguments)
            ? call.function.arguments
            : {},
        }),
      );

      this.logger.debug(
        `✓ Chat response (${message.content.length} chars, ${toolCalls.length} tool calls)`,
      );

      return {
        stopReason: this.toStopReason(response.data.done_reason, toolCalls),
        text: message.content,
        toolCalls,
      };
    } catch (error) {
      this.logger.error(
        `Failed to generate chat response: ${errorMessage(error)}`,
      );

      if (this.isAxiosError(error) && error.response?.status === 404) {
        throw new Error(
          `Model "${model}" not found. Pull it with: ollama pull ${model}`,
        );
      }

      throw error;
    }
  }

  // ===== OPENAI CHAT =====

  private async chatOpenAI(request: ChatRequest): Promise<ChatResponse> {
    try {
      this.logger.debug(`Chat with OpenAI model ${this.config.openAIModel}`);

      const messages: OpenAIChatMessage[] = [
        { role: 'system', content: request.system },
        ...request.messages.map((m) => this.toOpenAIMessage(m)),
      ];

      const hasTools = !!request.tools?.length;

      const response = await firstValueFrom(
        this.httpService.post<OpenAIChatResponse>(
          `${this.config.openAIBaseUrl}/chat/completions`,
          {
            model: this.config.openAIModel,
            messages,
            temperature: request.temperature,
            max_tokens: request.maxTokens,
            ...(hasTools
              ? {
                  tools: request.tools?.map(toWireTool),
                  tool_choice: request.toolChoice ?? 'auto',
                  parallel_tool_calls: false,
                }
              : {}),
          },
          {
            timeout: this.config.completionTimeout,
            headers: {
              Authorization: `Bearer ${this.config.openAIApiKey}`,
              'Content-Type': 'application/json',
            },
          },
        ),
      );

      const choice = response.data.choices?.[0];
      if (!choice?.message) {
        throw new Error('Invalid OpenAI chat response format');
      }

      const toolCalls: ToolCall[] = (choice.message.tool_calls || []).map(
        (call) => ({
          id: call.id,
          name: call.function.name,
          arguments: parseToolArguments(call.function.arguments),
        }),
      );

      return {
        stopReason: this.toStopReason(choice.finish_reason, toolCalls),
        text: choice.message.content ?? '',
        toolCalls,
      };
    } catch (error) {
      this.logger.error(
        `Failed to generate OpenAI chat response: ${errorMessage(error)}`,
      );

      if (this.isAxiosError(error) && error.response?.status === 401) {
        throw new Error(
          'Invalid OpenAI API key. Please check your OPENAI_API_KEY.',
        );
      }

      if (this.isAxiosError(error) && error.response?.status === 404) {
        throw new Error(
          `OpenAI model "${this.config.openAIModel}" not found.`,
        );
      }

      throw error;
    }
  }

  private toOllamaMessage(message: ChatMessage): OllamaChatMessage {
    switch (message.role) {
      case 'user':
        return { role: 'user', content: message.content };
      case 'assistant':
        return {
          role: 'assistant',
          content: message.content,
          tool_calls: message.toolCalls?.map((call) => ({
            function: { name: call.name, arguments: call.arguments },
          })),
        };
      case 'tool':
        return {
          role: 'tool',
          content: message.content,
          tool_name: message.name,
        };
    }
  }

  private toOpenAIMessage(message: ChatMessage): OpenAIChatMessage {
    switch (message.role) {
      case 'user':
        return { role: 'user', content: message.content };
      case 'assistant':
        return {
          role: 'assistant',
          content: message.content || null,
          tool_calls: message.toolCalls?.map((call) => ({
            id: call.id,
            type: 'function',
            function: {
              name: call.name,
              arguments: JSON.stringify(call.arguments),
            },
          })),
        };
      case 'tool':
        return {
          role: 'tool',
          tool_call_id: message.toolCallId,
          content: message.content,
        };
    }
  }

  /**
   * Ollama reports "stop" even when it returns tool calls, so tool calls
   * take precedence over the provider's own reason.
   */
  private toStopReason(
    reason: string | undefined,
    toolCalls: ToolCall[],
  ): StopReason {
    if (toolCalls.length > 0) return 'tool_use';
    if (reason === 'length') return 'max_tokens';
    return 'end_turn';
  }

  /**
   * Retry a request with exponential backoff
   */
  private async retryRequest<T>(
    requestFn: () => Promise<T>,
    maxRetries: number,
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await requestFn();
      } catch (error) {
        lastError = error;

        // Don't retry on 404 (model not found) or 400 (bad request)
        if (
          this.isAxiosError(error) &&
          error.response &&
          [404, 400].includes(error.response.status)
        ) {
          throw error;
        }

        if (attempt < maxRetries) {
          const delay = Math.pow(2, attempt) * 1000; // Exponential backoff
          this.logger.warn(
            `Request failed (attempt ${attempt + 1}/${maxRetries + 1}), ` +
              `retrying in ${delay}ms...`,
          );
          await this.delay(delay);
        }
      }
    }

    throw lastError;
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  private isAxiosError(error: unknown): error is AxiosError {
    return isAxiosError(error);
  }
}

function toWireTool(tool: ToolDefinition): WireTool {
  return { type: 'function', function: tool };
}

/**
 * OpenAI sends tool arguments as a JSON string; anything that is not a JSON
 * object becomes an empty argument set and fails tool-side validation.
 */
export function parseToolArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}
