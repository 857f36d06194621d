import { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface StubReply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type StubHandler = (config: InternalAxiosRequestConfig) => StubReply | Error;

/**
 * In-process axios adapter: answers every request through `handler` and
 * rejects non-2xx replies the way the real adapters do.
 */
export function stubAdapter(handler: StubHandler): { adapter: AxiosAdapter; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const reply = handler(config);
    if (reply instanceof Error) {
      throw new AxiosError(reply.message, AxiosError.ECONNABORTED, config);
    }
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: reply.headers ?? {},
      config,
    };
    if (reply.status >= 400) {
      throw new AxiosError(`Request failed with status code ${reply.status}`, AxiosError.ERR_BAD_RESPONSE, config, undefined, response);
    }
    return response;
  };
  return { adapter, requests };
}

export function bodyOf(config: InternalAxiosRequestConfig | undefined): unknown {
  const data: unknown = config?.data;
  return typeof data === 'string' ? JSON.parse(data) : data;
}
