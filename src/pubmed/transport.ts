/**
 * HTTP transport used by the PubMed client.
 *
 * Resolves with the status and raw body for every HTTP response, including
 * error statuses; rejects only when no response arrived (network error, timeout).
 */

import axios, { type AxiosInstance } from "axios";

export interface HttpResponse {
  readonly status: number;
  readonly body: string;
}

export interface HttpTransport {
  get(url: string, params: Readonly<Record<string, string>>, timeoutMs: number): Promise<HttpResponse>;
}

export function createAxiosTransport(instance: AxiosInstance = axios.create()): HttpTransport {
  return {
    async get(url, params, timeoutMs) {
      const response = await instance.get<string>(url, {
        params,
        timeout: timeoutMs,
        responseType: "text",
        validateStatus: () => true,
      });
      return { status: response.status, body: String(response.data) };
    },
  };
}
