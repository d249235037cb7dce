import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { GenerationError } from '../errors.js';
import type { PromptInput } from '../types/index.js';

export interface InferenceBackend {
  name: string;
  type: 'anthropic' | 'ollama' | 'openai';
  model: string;
  baseUrl?: string;
  apiKey?: string;
}

export interface InferenceRequest {
  input: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface InferenceResponse {
  output: string;
  model: string;
  tokensUsed?: number;
  latencyMs: number;
}

// What the approval gate needs from a model: prompt in, free text out.
export interface GenerationBackend {
  generate(prompt: PromptInput, signal?: AbortSignal): Promise<string>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

const ollamaResponseSchema = z.object({ response: z.string() });

const openAiResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
  usage: z.object({ completion_tokens: z.number() }).optional()
});

const DEFAULT_SYSTEM_PROMPT = 'You are a cybersecurity assistant specialized in AV/EDR.';

export class InferenceRouter implements GenerationBackend {
  private backends: Map<string, InferenceBackend> = new Map();
  private anthropic = new Map<string, Anthropic>();
  private defaultBackend: string;
  private fetchImpl: FetchLike;

  constructor(backends: InferenceBackend[], defaultBackend: string, fetchImpl: FetchLike = fetch) {
    for (const backend of backends) {
      this.backends.set(backend.name, backend);
    }

    this.defaultBackend = defaultBackend;
    this.fetchImpl = fetchImpl;
  }

  async generate(prompt: PromptInput, signal?: AbortSignal): Promise<string> {
    const result = await this.infer({ input: prompt.user, systemPrompt: prompt.system, signal });
    return result.output;
  }

  async infer(request: InferenceRequest, backendName?: string): Promise<InferenceResponse> {
    const backend = this.backends.get(backendName || this.defaultBackend);
    if (!backend) {
      throw new GenerationError(`Backend ${backendName || this.defaultBackend} not configured`);
    }

    const startTime = Date.now();

    switch (backend.type) {
      case 'anthropic':
        return this.inferAnthropic(request, backend, startTime);

      case 'ollama':
        return this.inferOllama(request, backend, startTime);

      case 'openai':
        return this.inferOpenAi(request, backend, startTime);
    }
  }

  private anthropicClient(backend: InferenceBackend): Anthropic {
    let client = this.anthropic.get(backend.name);
    if (!client) {
      // Retries are left to whoever calls the gate
      client = new Anthropic({ apiKey: backend.apiKey, baseURL: backend.baseUrl, maxRetries: 0 });
      this.anthropic.set(backend.name, client);
    }
    return client;
  }

  private async inferAnthropic(
    request: InferenceRequest,
    backend: InferenceBackend,
    startTime: number
  ): Promise<InferenceResponse> {
    const response = await this.anthropicClient(backend).messages.create(
      {
        model: backend.model,
        max_tokens: request.maxTokens || 1024,
        system: request.systemPrompt || DEFAULT_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: request.input }]
      },
      { signal: request.signal }
    );

    const output = response.content
      .flatMap(block => (block.type === 'text' ? [block.text] : []))
      .join('\n');

    return {
      output,
      model: backend.model,
      tokensUsed: response.usage?.output_tokens,
      latencyMs: Date.now() - startTime
    };
  }

  private async postJson(url: string, body: object, signal?: AbortSignal, apiKey?: string): Promise<unknown> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (apiKey) {
      headers.Authorization = `Bearer ${apiKey}`;
    }

    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
      signal
    });

    if (!response.ok) {
      throw new GenerationError(`Backend error: HTTP ${response.status}`);
    }

    return response.json();
  }

  private async inferOllama(
    request: InferenceRequest,
    backend: InferenceBackend,
    startTime: number
  ): Promise<InferenceResponse> {
    const baseUrl = backend.baseUrl || 'http://localhost:11434';

    const data = await this.postJson(
      `${baseUrl}/api/generate`,
      {
        model: backend.model,
        prompt: request.input,
        system: request.systemPrompt,
        stream: false
      },
      request.signal
    );

    const parsed = ollamaResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new GenerationError('Malformed Ollama response');
    }

    return {
      output: parsed.data.response,
      model: backend.model,
      latencyMs: Date.now() - startTime
    };
  }

  // Any OpenAI-compatible chat endpoint, including Ollama's /v1 API
  private async inferOpenAi(
    request: InferenceRequest,
    backend: InferenceBackend,
    startTime: number
  ): Promise<InferenceResponse> {
    const baseUrl = backend.baseUrl || 'http://localhost:11434/v1';

    const data = await this.postJson(
      `${baseUrl}/chat/completions`,
      {
        model: backend.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        messages: [
          { role: 'system', content: request.systemPrompt || DEFAULT_SYSTEM_PROMPT },
          { role: 'user', content: request.input }
        ]
      },
      request.signal,
      backend.apiKey
    );

    const parsed = openAiResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new GenerationError('Malformed chat completion response');
    }

    return {
      output: parsed.data.choices[0].message.content ?? '',
      model: backend.model,
      tokensUsed: parsed.data.usage?.completion_tokens,
      latencyMs: Date.now() - startTime
    };
  }

  getAvailableBackends(): string[] {
    return Array.from(this.backends.keys());
  }
}
