import OpenAI from 'openai';
import type { ProviderFactoryContext, ProviderRequest, ProviderResult } from '../types.js';
import { BaseProvider } from '../base.js';

export interface OpenAIProviderConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
}

/** ai through the OpenAI chat completions API */
export class OpenAIProvider extends BaseProvider {
  readonly name = 'openai';
  readonly capabilities = ['ai'] as const;
  readonly defaultModel = 'gpt-4o-mini';

  private client: OpenAI;
  private model: string;

  constructor(config: OpenAIProviderConfig) {
    super({ maxRetries: 2, retryableErrors: ['rate_limit', 'overloaded', 'timeout', '503', '429'] });
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
    this.model = config.model ?? this.defaultModel;
  }

  async validateConnection(): Promise<boolean> {
    return true;
  }

  protected async _execute(request: ProviderRequest): Promise<ProviderResult> {
    if (request.action !== 'complete') this.unsupported(request);
    const prompt = request.params?.prompt;
    if (typeof prompt !== 'string' || prompt.length === 0) {
      throw new Error('complete needs a prompt');
    }

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      max_tokens: 1024,
    });
    const text = response.choices[0]?.message.content ?? '';
    return { ok: text.length > 0, output: text, data: { model: response.model } };
  }
}

export function createOpenAIProvider({ config, env }: ProviderFactoryContext): OpenAIProvider {
  const { openaiApiKey, openaiModel, openaiBaseUrl } = config.options;
  const apiKey = typeof openaiApiKey === 'string' ? openaiApiKey : env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error('OPENAI_API_KEY is not set');
  }
  return new OpenAIProvider({
    apiKey,
    model: typeof openaiModel === 'string' ? openaiModel : undefined,
    baseUrl: typeof openaiBaseUrl === 'string' ? openaiBaseUrl : env.OPENAI_BASE_URL,
  });
}
