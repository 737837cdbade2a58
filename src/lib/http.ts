import fetch, { type RequestInit, type Response } from "node-fetch";

export type UpstreamResponse = {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
};

export type HttpGet = (url: string, timeoutMs: number) => Promise<UpstreamResponse>;

/**
 * Runs `consume` under the same abort timer as the request, so a response
 * that stalls after its headers still times out.
 */
export const fetchWithTimeout = async <T>(
  url: string,
  consume: (response: Response) => Promise<T>,
  options: RequestInit = {},
  timeoutMs = 5_000,
): Promise<T> => {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { ...options, signal: controller.signal });
    return await consume(response);
  } finally {
    clearTimeout(timeout);
  }
};

export const httpGetJson: HttpGet = (url, timeoutMs) =>
  fetchWithTimeout(
    url,
    async (response): Promise<UpstreamResponse> => {
      const text = await response.text();
      return {
        ok: response.ok,
        status: response.status,
        statusText: response.statusText,
        json: async (): Promise<unknown> => JSON.parse(text),
      };
    },
    { headers: { accept: "application/json" } },
    timeoutMs,
  );
