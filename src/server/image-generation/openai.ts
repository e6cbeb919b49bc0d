import { z } from 'zod';
import {
  STORY_IMAGE_MODEL,
  STORY_IMAGE_QUALITY,
  STORY_IMAGE_SIZE,
  type StoryImageQuality,
  type StoryImageSize,
} from '@/shared/constants/image-generation';
import type { StoryImageGenerator } from '@/shared/types/stories';

export const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com/v1';

export type ImageGenerationErrorCode = 'http_error' | 'network_error' | 'invalid_response' | 'download_failed';

export class ImageGenerationError extends Error {
  readonly code: ImageGenerationErrorCode;
  readonly status?: number;

  constructor(message: string, options: { code: ImageGenerationErrorCode; status?: number; cause?: unknown }) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ImageGenerationError';
    this.code = options.code;
    if (options.status !== undefined) {
      this.status = options.status;
    }
  }
}

export type OpenAiImageParams = {
  prompt: string;
  model?: string;
  size?: StoryImageSize;
  quality?: StoryImageQuality;
};

export type OpenAiImageClientOptions = {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  requestTimeoutMs?: number;
  fetchImpl?: typeof fetch;
};

const imageResponseSchema = z.object({
  data: z
    .array(
      z.object({
        url: z.string().optional(),
        b64_json: z.string().optional(),
        revised_prompt: z.string().optional(),
      }),
    )
    .min(1),
});

const errorResponseSchema = z.object({
  error: z.object({ message: z.string() }),
});

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export function defaultOpenAiImagePayload(params: OpenAiImageParams) {
  const { prompt, model = STORY_IMAGE_MODEL, size = STORY_IMAGE_SIZE, quality = STORY_IMAGE_QUALITY } = params;
  return {
    model,
    prompt,
    size,
    quality,
    n: 1,
    response_format: 'url',
  } as const;
}

function describeFailure(status: number, text: string) {
  try {
    const parsed = errorResponseSchema.safeParse(JSON.parse(text));
    if (parsed.success) return `OpenAI image request failed ${status}: ${parsed.data.error.message}`;
  } catch {
    // not JSON; fall through to the raw body
  }
  return `OpenAI image request failed ${status}: ${text}`;
}

export class OpenAiImageClient implements StoryImageGenerator {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OpenAiImageClientOptions) {
    this.baseUrl = (options.baseUrl || OPENAI_DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  // The timeout stays armed until `read` has consumed the body.
  private async request<T>(url: string, init: RequestInit, read: (response: Response) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const timeoutMs = this.options.requestTimeoutMs ?? 120_000;
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      } catch (err) {
        throw new ImageGenerationError(`Request to ${url} failed: ${err instanceof Error ? err.message : String(err)}`, {
          code: 'network_error',
          cause: err,
        });
      }
      try {
        return await read(response);
      } catch (err) {
        if (err instanceof ImageGenerationError) throw err;
        throw new ImageGenerationError(`Reading response from ${url} failed: ${err instanceof Error ? err.message : String(err)}`, {
          code: 'network_error',
          cause: err,
        });
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  private fetchBytes(url: string): Promise<Uint8Array> {
    return this.request(url, {}, async (response) => {
      if (!response.ok) {
        throw new ImageGenerationError(`OpenAI image fetch failed ${response.status}: ${response.statusText}`, {
          code: 'download_failed',
          status: response.status,
        });
      }
      return new Uint8Array(await response.arrayBuffer());
    });
  }

  async generate(prompt: string): Promise<Uint8Array> {
    const payload = defaultOpenAiImagePayload({ prompt, model: this.options.model });
    const { ok, status, text } = await this.request(
      `${this.baseUrl}/images/generations`,
      {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify(payload),
      },
      async (response) => ({ ok: response.ok, status: response.status, text: await response.text() }),
    );
    if (!ok) {
      throw new ImageGenerationError(describeFailure(status, text), {
        code: 'http_error',
        status,
      });
    }
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new ImageGenerationError('OpenAI response was not valid JSON.', { code: 'invalid_response' });
    }
    const parsed = imageResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ImageGenerationError('OpenAI did not return image data.', { code: 'invalid_response' });
    }
    const [first] = parsed.data.data;
    if (isNonEmptyString(first.url)) {
      return this.fetchBytes(first.url);
    }
    if (isNonEmptyString(first.b64_json)) {
      return new Uint8Array(Buffer.from(first.b64_json, 'base64'));
    }
    throw new ImageGenerationError('OpenAI did not return image data.', { code: 'invalid_response' });
  }
}
