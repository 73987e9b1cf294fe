import { registerAs } from '@nestjs/config';

export interface LlmConfig {
  ollamaUrl: string;
  embeddingModel: string;
  chatModel: string;
  useOpenAI: boolean;
  openAIApiKey: string;
  openAIBaseUrl: string;
  openAIModel: string;
  // Answers are factual Q&A: deterministic and short by default
  temperature: number;
  maxTokens: number;
  completionTimeout: number;
  embeddingTimeout: number;
}

export default registerAs(
  'llm',
  (): LlmConfig => ({
    ollamaUrl: process.env.OLLAMA_API_URL || 'http://localhost:11434',
    embeddingModel: process.env.OLLAMA_EMBEDDING_MODEL || 'nomic-embed-text',
    chatModel: process.env.OLLAMA_LLM_MODEL || 'llama3.1:8b',
    useOpenAI: process.env.USE_OPENAI === '1',
    openAIApiKey: process.env.OPENAI_API_KEY || '',
    openAIBaseUrl: process.env.OPENAI_BASE_URL || 'https://api.openai.com/v1',
    openAIModel: process.env.OPENAI_MODEL || 'gpt-4.1-nano-2025-04-14',
    temperature: parseFloat(process.env.LLM_TEMPERATURE || '0'),
    maxTokens: parseInt(process.env.LLM_MAX_TOKENS || '800', 10),
    completionTimeout: parseInt(process.env.LLM_TIMEOUT || '120000', 10),
    embeddingTimeout: parseInt(process.env.EMBEDDING_TIMEOUT || '30000', 10),
  }),
);
