import OpenAI from 'openai';
import { getApiKey, type Config, type LlmProviderName } from '../config.js';

export interface LlmProvider {
  readonly name: LlmProviderName;
  readonly model: string;
  complete(prompt: string, signal?: AbortSignal): Promise<string>;
}

export class LlmError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LlmError';
  }
}

interface ProviderEndpoint {
  baseURL?: string;
  defaultModel: string;
}

// All providers speak the OpenAI chat completions protocol
const ENDPOINTS: Record<LlmProviderName, ProviderEndpoint> = {
  deepseek: { baseURL: 'https://api.deepseek.com', defaultModel: 'deepseek-chat' },
  grok: { baseURL: 'https://api.x.ai/v1', defaultModel: 'grok-2-latest' },
  github: { baseURL: 'https://models.inference.ai.azure.com', defaultModel: 'gpt-4o-mini' },
  openai: { defaultModel: 'gpt-4o-mini' },
};

const SYSTEM_PROMPT = 'You are a helpful assistant replying inside a Telegram chat. Keep answers short and use plain text.';

class OpenAICompatibleProvider implements LlmProvider {
  private client: OpenAI | null = null;

  constructor(
    readonly name: LlmProviderName,
    readonly model: string,
    private readonly apiKey: string,
    private readonly baseURL?: string
  ) {}

  async complete(prompt: string, signal?: AbortSignal): Promise<string> {
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.apiKey, baseURL: this.baseURL });
    }

    const started = Date.now();
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
      },
      { signal }
    );

    const text = response.choices[0]?.message?.content?.trim();
    if (!text) {
      throw new LlmError(`${this.name} returned an empty completion`);
    }

    console.log(`[LLM] ${this.name}/${this.model} answered in ${Date.now() - started}ms`);
    return text;
  }
}

export function createLlmProvider(
  config: Config,
  name: LlmProviderName = config.LLM_PROVIDER
): LlmProvider | undefined {
  const apiKey = getApiKey(config, name);
  if (!apiKey) {
    return undefined;
  }

  const endpoint = ENDPOINTS[name];
  const model = config.LLM_MODEL || endpoint.defaultModel;
  return new OpenAICompatibleProvider(name, model, apiKey, endpoint.baseURL);
}
