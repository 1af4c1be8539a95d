/**
 * Scripted axios transport
 *
 * Each request consumes the next reply. Non-2xx replies reject with an
 * AxiosError carrying the response, the way axios' own adapters settle.
 */

import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";

export type StubReply =
  | { status: number; data?: unknown; headers?: Record<string, string> }
  | { error: "timeout" | "network" };

export interface AxiosStub {
  adapter: AxiosAdapter;
  requests: InternalAxiosRequestConfig[];
}

export function createAxiosStub(replies: StubReply[]): AxiosStub {
  const queue = [...replies];
  const requests: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async config => {
    requests.push(config);
    const reply = queue.shift() ?? { status: 200, data: [] };

    if ("error" in reply) {
      throw reply.error === "timeout"
        ? new AxiosError("timeout of 30000ms exceeded", AxiosError.ECONNABORTED, config)
        : new AxiosError("socket hang up", AxiosError.ERR_NETWORK, config);
    }

    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: reply.headers ?? {},
      config,
    };
    if (reply.status >= 200 && reply.status < 300) {
      return response;
    }
    throw new AxiosError(
      `Request failed with status code ${String(reply.status)}`,
      reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
      config,
      undefined,
      response,
    );
  };

  return { adapter, requests };
}
