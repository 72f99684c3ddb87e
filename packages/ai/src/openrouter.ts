import { VizPilotError } from "@vizpilot/shared";

export interface OpenRouterMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface OpenRouterClientOptions {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  appName?: string;
  siteUrl?: string;
}

/** The subset of the client the agents depend on; tests substitute in-process fakes. */
export interface ChatClient {
  isConfigured: () => boolean;
  chat: (messages: OpenRouterMessage[], temperature?: number) => Promise<string>;
  chatJson: (messages: OpenRouterMessage[]) => Promise<unknown>;
}

export class OpenRouterClient implements ChatClient {
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly appName?: string;
  private readonly siteUrl?: string;

  constructor(options: OpenRouterClientOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.OPENROUTER_API_KEY;
    this.baseUrl = options.baseUrl ?? process.env.OPENROUTER_BASE_URL ?? "https://openrouter.ai/api/v1";
    this.model = options.model ?? process.env.OPENROUTER_MODEL ?? "openrouter/auto";
    this.appName = options.appName ?? process.env.OPENROUTER_APP_NAME;
    this.siteUrl = options.siteUrl ?? process.env.OPENROUTER_SITE_URL;
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  async chat(messages: OpenRouterMessage[], temperature: number = 0): Promise<string> {
    if (!this.apiKey) {
      throw new VizPilotError(
        "OPENROUTER_API_KEY is missing. Set it in your environment or .env file.",
        "OPENROUTER_NOT_CONFIGURED",
      );
    }

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: this.buildHeaders(this.apiKey),
      body: JSON.stringify({ model: this.model, temperature, messages }),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new VizPilotError(`OpenRouter request failed (${response.status}): ${text}`, "OPENROUTER_REQUEST_FAILED");
    }

    const content = extractMessageContent(await response.json());
    if (!content) {
      throw new VizPilotError("OpenRouter response did not include message content.", "OPENROUTER_EMPTY_RESPONSE");
    }

    return content;
  }

  private buildHeaders(apiKey: string): Record<string, string> {
    const headers: Record<string, string> = {
      "Authorization": `Bearer ${apiKey}`,
      "Content-Type": "application/json",
    };
    // OpenRouter attributes traffic through these two optional headers.
    if (this.siteUrl) headers["HTTP-Referer"] = this.siteUrl;
    if (this.appName) headers["X-Title"] = this.appName;
    return headers;
  }

  async chatJson(messages: OpenRouterMessage[]): Promise<unknown> {
    const responseText = await this.chat(messages, 0);
    return parseJsonContent(responseText);
  }
}

/** First choice's message text from a chat completion payload, if any. */
export function extractMessageContent(payload: unknown): string | undefined {
  if (!isObject(payload) || !Array.isArray(payload.choices)) return undefined;
  const first: unknown = payload.choices[0];
  if (!isObject(first) || !isObject(first.message)) return undefined;
  const content = first.message.content;
  return typeof content === "string" && content.trim() ? content : undefined;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses a model reply as JSON. Accepts fenced replies and replies with prose
 * around a single top-level object.
 */
export function parseJsonContent(responseText: string): unknown {
  const normalized = responseText.trim().replace(/^```(?:json)?\s*/i, "").replace(/```$/i, "").trim();
  try {
    return JSON.parse(normalized);
  } catch {
    const start = normalized.indexOf("{");
    const end = normalized.lastIndexOf("}");
    if (start >= 0 && end > start) {
      try {
        return JSON.parse(normalized.slice(start, end + 1));
      } catch {
        // reported below with the raw content
      }
    }
    throw new VizPilotError(
      `OpenRouter returned invalid JSON. Raw content: ${responseText}`,
      "OPENROUTER_INVALID_JSON",
    );
  }
}
