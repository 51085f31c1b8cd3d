import axios, { AxiosAdapter, AxiosInstance, isAxiosError } from 'axios';
import { LoggerLike } from '../common/logger';
import { TransportError } from '../common/errors';
import { ModelConfig } from '../config/config';
import { ModelRequest, ModelResponse } from '../types';

/** Text in, text out. May reject or hang; callers bound it with a timeout. */
export interface ModelTransport {
  generate(request: ModelRequest, signal: AbortSignal): Promise<string>;
}

interface GenerateContentResponse {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string }>;
    };
  }>;
}

function extractText(data: unknown): string {
  if (typeof data !== 'object' || data === null) {
    return '';
  }
  const response: GenerateContentResponse = data;
  const parts = response.candidates?.[0]?.content?.parts ?? [];
  return parts.map(part => (typeof part.text === 'string' ? part.text : '')).join('');
}

/** Waits between retries; an abort ends the wait at once and rejects */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new TransportError('Model request aborted'));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new TransportError('Model request aborted during retry delay'));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export interface GeminiClientOptions {
  apiKey: string;
  config: ModelConfig;
  /** Replaces the HTTP adapter, e.g. with an in-process stand-in */
  adapter?: AxiosAdapter;
}

/**
 * Generative Language API client. Retries only quota errors, resending the
 * identical payload.
 */
export class GeminiClient implements ModelTransport {
  private logger: LoggerLike;
  private config: ModelConfig;
  private client: AxiosInstance;

  constructor(options: GeminiClientOptions, logger: LoggerLike) {
    this.config = options.config;
    this.logger = logger;

    this.client = axios.create({
      baseURL: options.config.endpoint,
      timeout: options.config.timeoutMs,
      adapter: options.adapter,
      headers: {
        'Content-Type': 'application/json',
        'x-goog-api-key': options.apiKey
      }
    });
  }

  async generate(request: ModelRequest, signal: AbortSignal): Promise<string> {
    const body = {
      contents: [{ role: 'user', parts: [{ text: request.text }] }]
    };
    const url = `/models/${encodeURIComponent(this.config.name)}:generateContent`;

    for (let attempt = 0; ; attempt++) {
      try {
        const response = await this.client.post(url, body, { signal });
        return extractText(response.data);
      } catch (error) {
        const failure = this.toTransportError(error);
        if (failure.retryable && attempt < this.config.maxRetries && !signal.aborted) {
          this.logger.warn(`Model quota limit reached. Retrying in ${this.config.retryDelayMs}ms`, {
            attempt: attempt + 1,
            maxRetries: this.config.maxRetries
          });
          await sleep(this.config.retryDelayMs, signal);
          continue;
        }
        throw failure;
      }
    }
  }

  private toTransportError(error: unknown): TransportError {
    if (isAxiosError(error)) {
      const status = error.response?.status;
      const retryable = status === 429 || /resource exhausted/i.test(error.message);
      return new TransportError(`Model request failed: ${error.message}`, { status, retryable });
    }
    if (error instanceof Error) {
      return new TransportError(`Model request failed: ${error.message}`);
    }
    return new TransportError('Model request failed');
  }
}

/**
 * Runs one model call bounded by timeoutMs. A timeout or any transport failure
 * yields an empty response, which the parser treats like any malformed output.
 */
export async function callModelWithTimeout(
  transport: ModelTransport,
  request: ModelRequest,
  timeoutMs: number,
  logger: LoggerLike
): Promise<ModelResponse> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<ModelResponse>(resolve => {
    timer = setTimeout(() => {
      logger.warn('Model call timed out', { timeoutMs });
      controller.abort();
      resolve('');
    }, timeoutMs);
  });

  const call = transport.generate(request, controller.signal).then(
    text => (typeof text === 'string' ? text : ''),
    (error: unknown) => {
      if (!controller.signal.aborted) {
        logger.error('Model call failed, continuing without AI analysis', error);
      }
      return '';
    }
  );

  try {
    return await Promise.race([call, timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
