import { OpenAI } from "openai";
import { GoogleGenAI } from "@google/genai";
import Anthropic from "@anthropic-ai/sdk";
import { LLM_MODELS, GEMINI_MODELS, CLAUDE_MODELS, EMBEDDING_MODELS } from "../config/models";
import type { ProviderCredentials } from "../config/appConfig";

const OPENAI_MODELS = new Set<string>([
  ...Object.values(LLM_MODELS),
  EMBEDDING_MODELS.OPENAI_SMALL,
  EMBEDDING_MODELS.OPENAI_LARGE,
]);
const GEMINI_MODEL_SET = new Set<string>([...Object.values(GEMINI_MODELS), EMBEDDING_MODELS.GEMINI]);
const CLAUDE_MODEL_SET = new Set<string>(Object.values(CLAUDE_MODELS));

export type Provider = "openai" | "gemini" | "claude";

export function detectProvider(model: string): Provider {
  if (OPENAI_MODELS.has(model)) return "openai";
  if (GEMINI_MODEL_SET.has(model)) return "gemini";
  if (CLAUDE_MODEL_SET.has(model)) return "claude";
  if (model.startsWith("gpt-") || model.startsWith("o1") || model.startsWith("o3") ||
    model.startsWith("text-embedding-")) return "openai";
  if (model.startsWith("gemini-")) return "gemini";
  if (model.startsWith("claude-")) return "claude";
  throw new Error(`[LLM Client] Unknown model "${model}": cannot determine provider. Add it to the model registry in server/config/models.ts`);
}

export type LLMMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type LLMRequestOptions = {
  model: string;
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  jsonResponse?: boolean;
  signal?: AbortSignal;
};

export type LLMResponse = {
  text: string;
  provider: Provider;
  model: string;
};

export type EmbeddingRequestOptions = {
  model: string;
  inputs: string[];
  signal?: AbortSignal;
};

/**
 * Thin multi-provider client. SDK clients are created lazily from the
 * credentials handed in at construction; nothing here reads the environment.
 * Methods throw on provider errors; the backends turn those into results.
 */
export class LLMClient {
  private openai: OpenAI | null = null;
  private gemini: GoogleGenAI | null = null;
  private claude: Anthropic | null = null;

  constructor(private readonly credentials: ProviderCredentials) {}

  async generateText(opts: LLMRequestOptions): Promise<LLMResponse> {
    const provider = detectProvider(opts.model);

    switch (provider) {
      case "openai":
        return this.callOpenAI(opts);
      case "gemini":
        return this.callGemini(opts);
      case "claude":
        return this.callClaude(opts);
      default: {
        const _exhaustive: never = provider;
        throw new Error(`[LLM Client] Unhandled provider: ${_exhaustive}`);
      }
    }
  }

  /**
   * Embed a batch of inputs. Returns one entry per input, in input order;
   * entries are passed through unchecked for the caller to validate.
   */
  async embed(opts: EmbeddingRequestOptions): Promise<unknown[]> {
    const provider = detectProvider(opts.model);

    switch (provider) {
      case "openai": {
        const response = await this.getOpenAI().embeddings.create(
          { model: opts.model, input: opts.inputs },
          { signal: opts.signal },
        );
        return [...response.data]
          .sort((a, b) => a.index - b.index)
          .map((d) => d.embedding);
      }
      case "gemini": {
        const response = await this.getGemini().models.embedContent({
          model: opts.model,
          contents: opts.inputs,
        });
        return (response.embeddings ?? []).map((e) => e.values);
      }
      case "claude":
        throw new Error(`[LLM Client] Provider "claude" has no embedding models (requested "${opts.model}")`);
      default: {
        const _exhaustive: never = provider;
        throw new Error(`[LLM Client] Unhandled provider: ${_exhaustive}`);
      }
    }
  }

  private getOpenAI(): OpenAI {
    if (!this.openai) {
      const apiKey = this.credentials.openaiApiKey;
      if (!apiKey) throw new Error("[LLM Client] OPENAI_API_KEY is not set");
      this.openai = new OpenAI({
        apiKey,
        ...(this.credentials.openaiBaseUrl && { baseURL: this.credentials.openaiBaseUrl }),
        maxRetries: 0,
      });
    }
    return this.openai;
  }

  private getGemini(): GoogleGenAI {
    if (!this.gemini) {
      const apiKey = this.credentials.geminiApiKey;
      if (!apiKey) throw new Error("[LLM Client] GEMINI_API_KEY is not set");
      this.gemini = new GoogleGenAI({ apiKey });
    }
    return this.gemini;
  }

  private getClaude(): Anthropic {
    if (!this.claude) {
      const apiKey = this.credentials.anthropicApiKey;
      if (!apiKey) throw new Error("[LLM Client] ANTHROPIC_API_KEY is not set");
      this.claude = new Anthropic({ apiKey, maxRetries: 0 });
    }
    return this.claude;
  }

  private async callOpenAI(opts: LLMRequestOptions): Promise<LLMResponse> {
    const response = await this.getOpenAI().chat.completions.create(
      {
        model: opts.model,
        messages: opts.messages,
        ...(opts.temperature !== undefined && { temperature: opts.temperature }),
        ...(opts.maxTokens !== undefined && { max_tokens: opts.maxTokens }),
        ...(opts.jsonResponse && { response_format: { type: "json_object" as const } }),
      },
      { signal: opts.signal },
    );

    return {
      text: response.choices[0]?.message?.content || "",
      provider: "openai",
      model: opts.model,
    };
  }

  private async callGemini(opts: LLMRequestOptions): Promise<LLMResponse> {
    const systemParts = opts.messages
      .filter(m => m.role === "system")
      .map(m => m.content);

    const contents = opts.messages
      .filter(m => m.role !== "system")
      .map(m => ({
        role: m.role === "assistant" ? "model" as const : "user" as const,
        parts: [{ text: m.content }],
      }));

    const systemInstruction = systemParts.length > 0
      ? systemParts.join("\n\n")
      : undefined;

    const response = await this.getGemini().models.generateContent({
      model: opts.model,
      config: {
        ...(systemInstruction && { systemInstruction }),
        ...(opts.temperature !== undefined && { temperature: opts.temperature }),
        ...(opts.maxTokens !== undefined && { maxOutputTokens: opts.maxTokens }),
        ...(opts.jsonResponse && { responseMimeType: "application/json" }),
        ...(opts.signal && { abortSignal: opts.signal }),
      },
      contents,
    });

    return {
      text: response.text || "",
      provider: "gemini",
      model: opts.model,
    };
  }

  private async callClaude(opts: LLMRequestOptions): Promise<LLMResponse> {
    const systemContent = opts.messages
      .filter(m => m.role === "system")
      .map(m => m.content)
      .join("\n\n");

    const nonSystemMessages = opts.messages.flatMap(m =>
      m.role === "system" ? [] : [{ role: m.role, content: m.content }],
    );

    const response = await this.getClaude().messages.create(
      {
        model: opts.model,
        max_tokens: opts.maxTokens || 1024,
        ...(systemContent && { system: systemContent }),
        messages: nonSystemMessages,
        ...(opts.temperature !== undefined && { temperature: opts.temperature }),
      },
      { signal: opts.signal },
    );

    const textBlock = response.content.find(b => b.type === "text");

    return {
      text: textBlock?.type === "text" ? textBlock.text : "",
      provider: "claude",
      model: opts.model,
    };
  }
}
