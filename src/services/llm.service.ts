import axios, { AxiosInstance } from 'axios';
import fs from 'fs/promises';
import path from 'path';
import { LLM_CONFIG } from '../config/constants';
import { ChatMessage } from '../types/chat.types';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

// --- Type Definitions ---

interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
}

interface ChatCompletionResponse {
  id: string;
  choices?: {
    message?: {
      role: 'assistant';
      content: string | null;
    };
    finish_reason: string;
  }[];
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
  created: number;
}

export interface LLMGenerationResult {
  content: string;
  model: string;
  tokensUsed: {
    input: number;
    output: number;
    total: number;
  };
  processingTimeMs: number;
}

export type ChatHttpClient = Pick<AxiosInstance, 'post'>;

export interface ChatClientOptions {
  http: ChatHttpClient;
  model: string;
  systemPrompt: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ChatClient {
  readonly model: string;
  complete(userMessage: string): Promise<LLMGenerationResult>;
}

// --- Service Implementation ---

/**
 * axios instance for an OpenAI-compatible API (Groq serves one under
 * `/openai/v1`).
 */
export const createChatHttpClient = (baseURL: string, apiKey: string, timeoutMs: number): AxiosInstance =>
  axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: {
      Authorization: `Bearer ${apiKey}`,
      'Content-Type': 'application/json',
    },
  });

/**
 * Loads a prompt template from the filesystem.
 * @param templateName The name of the template file (e.g., 'agriculture-assistant.md').
 */
export const loadPromptTemplate = async (templateName: string): Promise<string> => {
  const templatePath = path.join(process.cwd(), 'src', 'config', 'prompts', templateName);
  try {
    const template = await fs.readFile(templatePath, 'utf-8');
    return template.trim();
  } catch (error) {
    logger.error(`Failed to load prompt template: ${templateName}`, { error });
    throw new Error(`Could not load prompt template: ${templateName}`);
  }
};

const describeFailure = (error: unknown): { status?: number; message: string } => {
  if (axios.isAxiosError(error)) {
    return { status: error.response?.status, message: error.message };
  }
  return { message: error instanceof Error ? error.message : String(error) };
};

/**
 * Single-turn chat client: every call sends the fixed system prompt and one
 * user message. Nothing is retried.
 */
export const createChatClient = ({
  http,
  model,
  systemPrompt,
  temperature = LLM_CONFIG.TEMPERATURE,
  maxTokens = LLM_CONFIG.MAX_TOKENS,
}: ChatClientOptions): ChatClient => ({
  model,

  async complete(userMessage) {
    const startTime = Date.now();
    const requestBody: ChatCompletionRequest = {
      model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userMessage },
      ],
      temperature,
      max_tokens: maxTokens,
    };

    let data: ChatCompletionResponse;
    try {
      const response = await http.post<ChatCompletionResponse>('/chat/completions', requestBody);
      data = response.data;
    } catch (error) {
      const failure = describeFailure(error);
      logger.error('LLM request failed', { model, ...failure });
      throw new AppError('AI_SERVICE_ERROR', `Chat completion request failed: ${failure.message}`, { cause: error });
    }

    const content = data.choices?.[0]?.message?.content;
    if (typeof content !== 'string' || content.trim() === '') {
      throw new AppError('AI_SERVICE_ERROR', 'Invalid response from LLM: no message content returned.');
    }

    const processingTimeMs = Date.now() - startTime;
    const tokensUsed = {
      input: data.usage?.prompt_tokens ?? 0,
      output: data.usage?.completion_tokens ?? 0,
      total: data.usage?.total_tokens ?? 0,
    };

    logger.info('LLM inference successful', { model, processingTimeMs, tokensUsed });

    return { content, model, tokensUsed, processingTimeMs };
  },
});
