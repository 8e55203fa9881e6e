import type { ResolutionRequest, SemanticResolver } from "@storyloom/schemas";
import { ConfigError } from "@storyloom/schemas";
import { StaticSemanticResolver, buildResolutionPrompt, NO_MATCH_TOKEN } from "@storyloom/resolver";
import type { ResolverKind } from "./config.js";

/** One bare model call; returns the raw reply text. */
export type ModelCallFn = (systemPrompt: string, userPrompt: string, signal: AbortSignal) => Promise<string>;

type AnthropicClient = InstanceType<typeof import("@anthropic-ai/sdk").default>;
type OpenAIClient = InstanceType<typeof import("openai").default>;
type GeminiClient = InstanceType<typeof import("@google/genai").GoogleGenAI>;

/** A choice key is a handful of tokens; anything longer is not an answer. */
const MAX_OUTPUT_TOKENS = 32;

export const DEFAULT_MODELS: Record<Exclude<ResolverKind, "mock">, string> = {
  claude: "claude-3-5-haiku-latest",
  openai: "gpt-4o-mini",
  gemini: "gemini-2.5-flash",
};

/**
 * Adapts a provider call function to the resolver's semantic contract.
 * No retries: a failed or slow call is an unresolved turn.
 */
export class ModelSemanticResolver implements SemanticResolver {
  readonly name: string;
  readonly model: string;
  private call: ModelCallFn;

  constructor(name: string, model: string, call: ModelCallFn) {
    this.name = name;
    this.model = model;
    this.call = call;
  }

  async resolve(request: ResolutionRequest, signal: AbortSignal): Promise<string> {
    const { system, user } = buildResolutionPrompt(request);
    return this.call(system, user, signal);
  }
}

function createClaudeCallFn(model: string, env: NodeJS.ProcessEnv): ModelCallFn {
  const apiKey = env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new ConfigError(
      "ANTHROPIC_API_KEY environment variable is required for the claude resolver.\n" +
      "Set it in .env or export it, or use --resolver mock",
    );
  }

  // Cache client across calls for connection pooling; clear on failure so the next call retries
  let clientPromise: Promise<AnthropicClient> | null = null;

  return async (systemPrompt, userPrompt, signal) => {
    if (!clientPromise) {
      clientPromise = import("@anthropic-ai/sdk").then(
        ({ default: Anthropic }) => new Anthropic({ apiKey, maxRetries: 0 }),
      ).catch((err: unknown) => { clientPromise = null; throw err; });
    }
    const client = await clientPromise;
    const response = await client.messages.create(
      {
        model,
        max_tokens: MAX_OUTPUT_TOKENS,
        temperature: 0,
        system: systemPrompt,
        messages: [{ role: "user", content: userPrompt }],
      },
      { signal },
    );
    for (const block of response.content) {
      if (block.type === "text") return block.text;
    }
    throw new Error("Claude returned no text content");
  };
}

function createOpenAICallFn(model: string, env: NodeJS.ProcessEnv): ModelCallFn {
  const apiKey = env.OPENAI_API_KEY;
  const baseURL = env.OPENAI_BASE_URL;
  if (!apiKey && !baseURL) {
    throw new ConfigError(
      "OPENAI_API_KEY or OPENAI_BASE_URL environment variable is required for the openai resolver.\n" +
      "For local endpoints (Ollama, vLLM): export OPENAI_BASE_URL=http://localhost:11434/v1",
    );
  }

  let clientPromise: Promise<OpenAIClient> | null = null;

  return async (systemPrompt, userPrompt, signal) => {
    if (!clientPromise) {
      clientPromise = import("openai").then(
        ({ default: OpenAI }) => new OpenAI({
          apiKey: apiKey ?? "not-needed",
          maxRetries: 0,
          ...(baseURL ? { baseURL } : {}),
        }),
      ).catch((err: unknown) => { clientPromise = null; throw err; });
    }
    const client = await clientPromise;
    const response = await client.chat.completions.create(
      {
        model,
        temperature: 0,
        max_tokens: MAX_OUTPUT_TOKENS,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: userPrompt },
        ],
      },
      { signal },
    );
    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new Error("OpenAI returned no content");
    }
    // Strip Qwen3-style <think>...</think> reasoning tags from local models
    return content.replace(/<think>[\s\S]*?<\/think>\s*/g, "");
  };
}

function createGeminiCallFn(model: string, env: NodeJS.ProcessEnv): ModelCallFn {
  const apiKey = env.GOOGLE_API_KEY;
  if (!apiKey) {
    throw new ConfigError("GOOGLE_API_KEY environment variable is required for the gemini resolver.");
  }

  let clientPromise: Promise<GeminiClient> | null = null;

  return async (systemPrompt, userPrompt, signal) => {
    if (!clientPromise) {
      clientPromise = import("@google/genai").then(
        ({ GoogleGenAI }) => new GoogleGenAI({ apiKey }),
      ).catch((err: unknown) => { clientPromise = null; throw err; });
    }
    const client = await clientPromise;
    const response = await client.models.generateContent({
      model,
      contents: userPrompt,
      config: {
        systemInstruction: systemPrompt,
        temperature: 0,
        maxOutputTokens: MAX_OUTPUT_TOKENS,
        thinkingConfig: { thinkingBudget: 0 },
        abortSignal: signal,
      },
    });
    const text = response.text;
    if (!text) {
      throw new Error("Gemini returned no content");
    }
    return text;
  };
}

/**
 * Builds the semantic fallback for the configured provider. Missing
 * credentials fail here, at startup, rather than on the first turn.
 */
export function createSemanticResolver(
  opts: { resolver: ResolverKind; model?: string },
  env: NodeJS.ProcessEnv = process.env,
): SemanticResolver {
  switch (opts.resolver) {
    case "mock":
      return new StaticSemanticResolver(NO_MATCH_TOKEN);
    case "claude": {
      const model = opts.model ?? DEFAULT_MODELS.claude;
      return new ModelSemanticResolver("claude", model, createClaudeCallFn(model, env));
    }
    case "openai": {
      const model = opts.model ?? DEFAULT_MODELS.openai;
      return new ModelSemanticResolver("openai", model, createOpenAICallFn(model, env));
    }
    case "gemini": {
      const model = opts.model ?? DEFAULT_MODELS.gemini;
      return new ModelSemanticResolver("gemini", model, createGeminiCallFn(model, env));
    }
    default: {
      const exhaustive: never = opts.resolver;
      throw new ConfigError(`Unknown resolver: ${String(exhaustive)}`);
    }
  }
}
