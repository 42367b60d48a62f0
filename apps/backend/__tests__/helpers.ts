import axios, {
  AxiosError,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';
import { vi } from 'vitest';
import type {
  GenerationCandidate,
  GenerationRequest,
  TextGenerator,
} from '@/services/generationService';

export type FakeReply = { status: number; data?: unknown } | { network: true };

export type Responder = (params: Record<string, unknown>) => FakeReply;

/**
 * Axios instance whose adapter answers in-process instead of hitting Google Books.
 */
export function createFakeVolumesClient(respond: Responder): {
  client: AxiosInstance;
  calls: Array<Record<string, unknown>>;
} {
  const calls: Array<Record<string, unknown>> = [];

  const adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const params: Record<string, unknown> = config.params ?? {};
    calls.push(params);
    const reply = respond(params);

    if ('network' in reply) {
      throw new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED', config);
    }

    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
    if (reply.status < 200 || reply.status >= 300) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        undefined,
        response
      );
    }
    return response;
  };

  return { client: axios.create({ adapter }), calls };
}

export function volumes(...infos: Array<Record<string, unknown>>): FakeReply {
  return {
    status: 200,
    data: { kind: 'books#volumes', items: infos.map((volumeInfo) => ({ volumeInfo })) },
  };
}

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export class FakeGenerator implements TextGenerator {
  requests: GenerationRequest[] = [];
  private reply: () => Promise<GenerationCandidate[]>;

  constructor(reply: () => Promise<GenerationCandidate[]>) {
    this.reply = reply;
  }

  async generate(request: GenerationRequest): Promise<GenerationCandidate[]> {
    this.requests.push(request);
    return this.reply();
  }
}
