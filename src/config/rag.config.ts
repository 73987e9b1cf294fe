import { Logger } from '@nestjs/common';
import { registerAs } from '@nestjs/config';

export interface RagConfig {
  /** Result cap for one similarity query over course content */
  maxResults: number;
  /** Number of user/assistant turns kept per session */
  maxHistory: number;
}

const logger = new Logger('RagConfig');

function positiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    logger.warn(`⚠️ ${name}="${raw}" is not a positive integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

export default registerAs(
  'rag',
  (): RagConfig => ({
    maxResults: positiveInt('RAG_MAX_RESULTS', 5),
    maxHistory: positiveInt('RAG_MAX_HISTORY', 2),
  }),
);
