import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface FakeReply {
  status: number;
  data?: unknown;
  networkError?: string;
}

/** An axios instance whose transport is a local function; nothing leaves the process. */
export function fakeHttp(handler: (config: InternalAxiosRequestConfig) => FakeReply): {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async config => {
      requests.push(config);
      const reply = handler(config);
      if (reply.networkError) {
        throw new AxiosError(`connect ${reply.networkError}`, reply.networkError, config);
      }
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      };
      if (reply.status >= 400) {
        const code = reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST;
        throw new AxiosError(`Request failed with status code ${reply.status}`, code, config, null, response);
      }
      return response;
    },
  });
  return { http, requests };
}

export function budget(): { timeoutMs: number; signal: AbortSignal } {
  return { timeoutMs: 1000, signal: new AbortController().signal };
}
