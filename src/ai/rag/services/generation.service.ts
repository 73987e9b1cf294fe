import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaService } from '../../llm/ollama.service';
import {
  ChatMessage,
  ChatRequest,
  ChatResponse,
  ToolCall,
} from '../../llm/llm.types';
import { LlmConfig } from '../../../config/llm.config';
import { GenerationError, UnknownToolError } from '../../errors';
import { SourceCitation } from '../../models/course.model';
import { buildSystemPrompt } from '../../prompts/system.prompt';
import { errorMessage } from '../../../common/utils/guards';
import { ToolRegistry } from '../tools/tool-registry';

export const INCOMPLETE_ANSWER_FALLBACK =
  'I was unable to generate a complete response. Please try rephrasing your question.';

export interface GenerationInput {
  query: string;
  history: string | null;
  tools: ToolRegistry;
}

export interface GenerationOutcome {
  answer: string;
  sources: SourceCitation[];
}

type ModelRound = 'initial' | 'follow_up';

type GenerationState =
  | { phase: 'init' }
  | { phase: 'awaiting_model'; round: ModelRound }
  | { phase: 'tool_requested'; response: ChatResponse }
  | { phase: 'answered'; answer: string };

/**
 * Two-phase tool-use loop:
 * init → awaiting_model(initial) → answered
 *                                → tool_requested → awaiting_model(follow_up) → answered
 * The follow-up call carries no tool definitions, so at most one tool round
 * happens per query.
 */
@Injectable()
export class GenerationService {
  private readonly logger = new Logger(GenerationService.name);
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(
    private readonly ollamaService: OllamaService,
    private readonly configService: ConfigService,
  ) {
    const llm = this.configService.getOrThrow<LlmConfig>('llm');
    this.temperature = llm.temperature;
    this.maxTokens = llm.maxTokens;
  }

  async generate(input: GenerationInput): Promise<GenerationOutcome> {
    const system = buildSystemPrompt(input.history);
    const messages: ChatMessage[] = [];
    let sources: SourceCitation[] = [];
    let state: GenerationState = { phase: 'init' };

    this.logger.debug(`🤖 Generating answer for: "${input.query}"`);

    while (state.phase !== 'answered') {
      switch (state.phase) {
        case 'init':
          messages.push({ role: 'user', content: input.query });
          state = { phase: 'awaiting_model', round: 'initial' };
          break;

        case 'awaiting_model': {
          const round: ModelRound = state.round;
          const response = await this.callModel(
            round === 'initial'
              ? {
                  system,
                  messages,
                  tools: input.tools.definitions(),
                  toolChoice: 'auto',
                  temperature: this.temperature,
                  maxTokens: this.maxTokens,
                }
              : {
                  system,
                  messages,
                  temperature: this.temperature,
                  maxTokens: this.maxTokens,
                },
          );

          if (round === 'initial' && response.toolCalls.length > 0) {
            state = { phase: 'tool_requested', response };
          } else if (round === 'initial') {
            state = { phase: 'answered', answer: response.text };
          } else {
            state = {
              phase: 'answered',
              answer: response.text.trim()
                ? response.text
                : INCOMPLETE_ANSWER_FALLBACK,
            };
          }
          break;
        }

        case 'tool_requested': {
          const { response } = state;
          messages.push({
            role: 'assistant',
            content: response.text,
            toolCalls: response.toolCalls,
          });

          for (const call of response.toolCalls) {
            const result = await this.runTool(input.tools, call);
            if (result.sources.length > 0) {
              sources = result.sources;
            }
            messages.push({
              role: 'tool',
              toolCallId: call.id,
              name: call.name,
              content: result.content,
            });
          }

          state = { phase: 'awaiting_model', round: 'follow_up' };
          break;
        }
      }
    }

    this.logger.debug(
      `✅ Answer ready (${state.answer.length} chars, ${sources.length} source(s))`,
    );
    return { answer: state.answer, sources };
  }

  private async callModel(request: ChatRequest): Promise<ChatResponse> {
    try {
      return await this.ollamaService.chat(request);
    } catch (error) {
      this.logger.error(`Model call failed: ${errorMessage(error)}`);
      throw new GenerationError(
        `Language model request failed: ${errorMessage(error)}`,
        error,
      );
    }
  }

  private async runTool(
    tools: ToolRegistry,
    call: ToolCall,
  ): Promise<{ content: string; sources: SourceCitation[] }> {
    this.logger.debug(
      `🔧 Tool call ${call.name}(${JSON.stringify(call.arguments)})`,
    );

    try {
      const result = await tools.dispatch(call.name, call.arguments);
      return { content: result.content, sources: result.sources };
    } catch (error) {
      if (error instanceof UnknownToolError) {
        this.logger.warn(`Model requested unknown tool "${error.toolName}"`);
      } else {
        this.logger.error(`Tool ${call.name} failed: ${errorMessage(error)}`);
      }
      return {
        content: `Tool execution error: ${errorMessage(error)}`,
        sources: [],
      };
    }
  }
}
