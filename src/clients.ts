import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { z } from "zod";

import { RemoteCallError, type RemoteService } from "./errors";
import { withRetry, type RetryPolicy } from "./retry";

export interface ServiceClientOptions {
  url: string;
  timeoutMs: number;
  retry: RetryPolicy;
  http?: AxiosInstance;
}

const translationResponseSchema = z.object({
  translated_message: z.string()
});

const scoringResponseSchema = z.object({
  score: z.number().finite()
});

function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 429 || status === 408;
}

abstract class ServiceClient {
  protected abstract readonly service: RemoteService;
  private readonly http: AxiosInstance;

  constructor(private readonly options: ServiceClientOptions) {
    this.http = options.http ?? axios.create();
  }

  protected async post<T>(
    payload: Record<string, unknown>,
    schema: z.ZodType<T>
  ): Promise<T> {
    return withRetry(
      () => this.postOnce(payload, schema),
      this.options.retry,
      (error, attempt, delayMs) => {
        console.warn(
          `${this.service} call failed on attempt ${attempt}, retrying in ${delayMs}ms: ${error.message}`
        );
      }
    );
  }

  private async postOnce<T>(
    payload: Record<string, unknown>,
    schema: z.ZodType<T>
  ): Promise<T> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(this.options.url, payload, {
        timeout: this.options.timeoutMs,
        headers: { "Content-Type": "application/json" },
        validateStatus: () => true
      });
    } catch (error) {
      // With validateStatus accepting everything, only transport failures land here.
      const reason = axios.isAxiosError(error)
        ? `${error.code ?? "request failed"}: ${error.message}`
        : String(error);
      throw new RemoteCallError(
        this.service,
        `${this.service} request failed (${reason})`,
        true,
        1,
        { cause: error }
      );
    }

    if (response.status < 200 || response.status >= 300) {
      throw new RemoteCallError(
        this.service,
        `${this.service} service responded with HTTP ${response.status}`,
        isTransientStatus(response.status)
      );
    }

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      throw new RemoteCallError(
        this.service,
        `${this.service} service returned a malformed body`,
        false
      );
    }
    return parsed.data;
  }
}

export class TranslationClient extends ServiceClient {
  protected readonly service = "translation";

  constructor(
    options: ServiceClientOptions,
    private readonly targetLanguage: string
  ) {
    super(options);
  }

  async translate(text: string, sourceLanguage?: string): Promise<string> {
    const body = await this.post(
      {
        message: text,
        target_language: this.targetLanguage,
        ...(sourceLanguage ? { source_language: sourceLanguage } : {})
      },
      translationResponseSchema
    );
    return body.translated_message;
  }
}

export class ScoringClient extends ServiceClient {
  protected readonly service = "scoring";

  async score(text: string): Promise<number> {
    const body = await this.post({ message: text }, scoringResponseSchema);
    return body.score;
  }
}
