import axios from "axios";

import { InferenceError, errorMessage } from "../errors.js";
import type { LlmProvider } from "../types.js";

export interface BackendTarget {
  baseUrl: string;
  model: string;
  apiKey?: string;
  signal: AbortSignal;
}

export interface GenerateRequest extends BackendTarget {
  prompt: string;
  maxResponseBytes: number;
}

/** Wire adapter for one text-generation server flavour. */
export interface InferenceBackend {
  readonly name: LlmProvider;
  generate(request: GenerateRequest): Promise<string>;
  listModels(target: BackendTarget): Promise<string[]>;
}

function trimBase(base: string): string {
  return String(base || "").replace(/\/+$/, "");
}

function authHeaders(apiKey?: string): Record<string, string> {
  return apiKey ? { Authorization: `Bearer ${apiKey}` } : {};
}

// The body limit sits above maxResponseBytes because the text arrives inside a JSON envelope.
function bodyLimit(maxResponseBytes: number): number {
  return maxResponseBytes * 4 + 4096;
}

export const ollamaBackend: InferenceBackend = {
  name: "ollama",
  async generate(request) {
    const { data } = await axios.post<{ response?: unknown }>(
      `${trimBase(request.baseUrl)}/api/generate`,
      {
        model: request.model,
        prompt: request.prompt,
        stream: false,
        options: { temperature: 0 }
      },
      {
        signal: request.signal,
        maxContentLength: bodyLimit(request.maxResponseBytes)
      }
    );
    return typeof data?.response === "string" ? data.response : "";
  },
  async listModels(target) {
    const { data } = await axios.get<{ models?: Array<{ name?: unknown }> }>(`${trimBase(target.baseUrl)}/api/tags`, {
      signal: target.signal
    });
    return (data?.models || []).map((m) => String(m?.name || "")).filter(Boolean);
  }
};

export const openAiCompatibleBackend: InferenceBackend = {
  name: "openai",
  async generate(request) {
    const { data } = await axios.post<{ choices?: Array<{ message?: { content?: unknown } }> }>(
      `${trimBase(request.baseUrl)}/chat/completions`,
      {
        model: request.model,
        temperature: 0,
        messages: [{ role: "user", content: request.prompt }]
      },
      {
        signal: request.signal,
        headers: authHeaders(request.apiKey),
        maxContentLength: bodyLimit(request.maxResponseBytes)
      }
    );
    const content = data?.choices?.[0]?.message?.content;
    return typeof content === "string" ? content : "";
  },
  async listModels(target) {
    const { data } = await axios.get<{ data?: Array<{ id?: unknown }> }>(`${trimBase(target.baseUrl)}/models`, {
      signal: target.signal,
      headers: authHeaders(target.apiKey)
    });
    return (data?.data || []).map((m) => String(m?.id || "")).filter(Boolean);
  }
};

export function backendFor(provider: LlmProvider): InferenceBackend {
  return provider === "openai" ? openAiCompatibleBackend : ollamaBackend;
}

const RETRYABLE_STATUS = new Set([408, 425, 429]);

/** Maps a transport failure onto the gateway's failure kinds. */
export function classifyTransportError(err: unknown): InferenceError {
  if (err instanceof InferenceError) return err;
  if (axios.isCancel(err)) {
    return new InferenceError("Cancelled", "Inference request was cancelled", { cause: err });
  }
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    if (status !== undefined) {
      if (status >= 500 || RETRYABLE_STATUS.has(status)) {
        return new InferenceError("BackendUnreachable", `Backend answered HTTP ${status}`, { status, cause: err });
      }
      return new InferenceError("BackendRejected", `Backend rejected the request with HTTP ${status}`, { status, cause: err });
    }
    if (/maxContentLength/i.test(err.message)) {
      return new InferenceError("ResponseTooLarge", "Backend response exceeded the size limit", { cause: err });
    }
    return new InferenceError("BackendUnreachable", `Backend unreachable: ${err.code || err.message}`, { cause: err });
  }
  return new InferenceError("BackendUnreachable", `Backend call failed: ${errorMessage(err)}`, {
    cause: err
  });
}
