import { GoogleGenAI } from '@google/genai';
import OpenAI from 'openai';
import type { AppConfig, BackendConfig } from '../config';
import type { GenerativeBackend } from './types';

const TEMPERATURE = 0.3;
const MAX_TOKENS = 2000;

export class GeminiBackend implements GenerativeBackend {
  readonly name = 'gemini';
  private readonly ai: GoogleGenAI;
  private readonly model: string;

  constructor(config: BackendConfig, timeoutMs: number) {
    this.ai = new GoogleGenAI({ apiKey: config.apiKey, httpOptions: { timeout: timeoutMs } });
    this.model = config.model;
  }

  async generate(prompt: string) {
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents: prompt,
      config: {
        temperature: TEMPERATURE,
        maxOutputTokens: MAX_TOKENS,
        responseMimeType: 'application/json'
      }
    });
    return response.text || '';
  }
}

/** DeepSeek speaks the OpenAI chat-completions protocol. */
export class DeepSeekBackend implements GenerativeBackend {
  readonly name = 'deepseek';
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(config: BackendConfig, timeoutMs: number) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: timeoutMs,
      maxRetries: 0
    });
    this.model = config.model;
  }

  async generate(prompt: string) {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: TEMPERATURE,
      max_tokens: MAX_TOKENS
    });
    return completion.choices[0]?.message?.content ?? '';
  }
}

/** Backends in the order they are tried. */
export const createBackends = (config: AppConfig): GenerativeBackend[] => {
  const backends: GenerativeBackend[] = [];
  if (config.gemini) backends.push(new GeminiBackend(config.gemini, config.llmTimeoutMs));
  if (config.deepseek) backends.push(new DeepSeekBackend(config.deepseek, config.llmTimeoutMs));
  return backends;
};
