import { InferenceError } from "../errors.js";
import { logger as rootLogger, type Logger } from "../observability/logger.js";
import { inferenceLatencyHistogram } from "../observability/metrics.js";
import type { LlmProvider } from "../types.js";
import { backendFor, classifyTransportError, type InferenceBackend } from "./backends.js";

export interface InferenceGatewayOptions {
  model: string;
  baseUrl: string;
  apiKey?: string;
  provider?: LlmProvider;
  backend?: InferenceBackend;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  maxResponseBytes?: number;
  logger?: Logger;
}

export interface InferOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ProbeResult {
  reachable: boolean;
  modelAvailable: boolean;
  models: string[];
  error?: string;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}

export class InferenceGateway {
  readonly model: string;
  readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly backend: InferenceBackend;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly maxResponseBytes: number;
  private readonly log: Logger;

  constructor(opts: InferenceGatewayOptions) {
    this.model = opts.model;
    this.baseUrl = opts.baseUrl;
    this.apiKey = opts.apiKey || "";
    this.backend = opts.backend ?? backendFor(opts.provider ?? "ollama");
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.maxRetries = Math.max(0, opts.maxRetries ?? 2);
    this.retryDelayMs = opts.retryDelayMs ?? 250;
    this.maxResponseBytes = opts.maxResponseBytes ?? 16_384;
    this.log = (opts.logger ?? rootLogger).child({ component: "inference" });
  }

  /**
   * Sends one prompt and returns the raw text. The timeout bounds the whole
   * call, retries included. Only BackendUnreachable is retried; an empty
   * response is a valid answer.
   */
  async infer(prompt: string, opts: InferOptions = {}): Promise<string> {
    const timeoutMs = opts.timeoutMs ?? this.timeoutMs;
    const external = opts.signal;
    if (external?.aborted) throw new InferenceError("Cancelled", "Inference cancelled before start");

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const forwardAbort = () => controller.abort();
    external?.addEventListener("abort", forwardAbort, { once: true });

    const startedAt = Date.now();
    try {
      for (let attempt = 0; ; attempt += 1) {
        try {
          const text = await this.attempt(prompt, controller.signal);
          const bytes = Buffer.byteLength(text, "utf8");
          if (bytes > this.maxResponseBytes) {
            throw new InferenceError("ResponseTooLarge", `Response of ${bytes} bytes exceeds ${this.maxResponseBytes}`);
          }
          inferenceLatencyHistogram.observe((Date.now() - startedAt) / 1000);
          this.log.debug({ attempt, bytes, latencyMs: Date.now() - startedAt }, "inference completed");
          return text;
        } catch (err) {
          let failure = classifyTransportError(err);
          if (timedOut) {
            failure = new InferenceError("BackendUnreachable", `Inference timed out after ${timeoutMs}ms`, { cause: err });
          } else if (external?.aborted) {
            failure = new InferenceError("Cancelled", "Inference cancelled", { cause: err });
          }
          if (failure.kind !== "BackendUnreachable" || attempt >= this.maxRetries || controller.signal.aborted) {
            throw failure;
          }
          this.log.warn({ attempt: attempt + 1, err: failure.message }, "inference attempt failed, retrying");
          await sleep(this.retryDelayMs * (attempt + 1), controller.signal);
        }
      }
    } finally {
      clearTimeout(timer);
      external?.removeEventListener("abort", forwardAbort);
    }
  }

  // Resolves with the backend's answer unless the signal fires first, so a
  // backend that ignores the signal cannot hold the caller past the deadline.
  private attempt(prompt: string, signal: AbortSignal): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const onAbort = () => reject(new InferenceError("Cancelled", "Inference aborted"));
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener("abort", onAbort, { once: true });
      void this.backend
        .generate({
          prompt,
          model: this.model,
          baseUrl: this.baseUrl,
          apiKey: this.apiKey,
          signal,
          maxResponseBytes: this.maxResponseBytes
        })
        .then(
          (text) => {
            signal.removeEventListener("abort", onAbort);
            resolve(String(text ?? ""));
          },
          (err: unknown) => {
            signal.removeEventListener("abort", onAbort);
            reject(err);
          }
        );
    });
  }

  /** Checks that the backend answers and lists the configured model. */
  async probe(timeoutMs = 5_000): Promise<ProbeResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const models = await this.backend.listModels({
        baseUrl: this.baseUrl,
        model: this.model,
        apiKey: this.apiKey,
        signal: controller.signal
      });
      return { reachable: true, modelAvailable: models.includes(this.model), models };
    } catch (err) {
      const failure = classifyTransportError(err);
      return {
        reachable: failure.kind === "BackendRejected",
        modelAvailable: false,
        models: [],
        error: failure.message
      };
    } finally {
      clearTimeout(timer);
    }
  }

  /** Probes up to `attempts` times; resolves with the last result. */
  async waitUntilReachable(attempts: number, delayMs = 1_000, signal?: AbortSignal): Promise<ProbeResult> {
    let result: ProbeResult = { reachable: false, modelAvailable: false, models: [], error: "not probed" };
    const never = new AbortController().signal;
    for (let i = 0; i < Math.max(1, attempts); i += 1) {
      if (signal?.aborted) break;
      result = await this.probe();
      if (result.reachable) return result;
      this.log.warn({ attempt: i + 1, attempts, err: result.error }, "backend not reachable yet");
      if (i < attempts - 1) await sleep(delayMs, signal ?? never);
    }
    return result;
  }
}
