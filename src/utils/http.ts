// CHANGE: Provide a GitHub-bound JSON client built from explicit connection options.
// WHY: The token, base URL, and timeout are fixed at construction; requests never consult the environment.
// SOURCE: internal reasoning

import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from "axios";
import type { JsonValue } from "../types.js";
import { isRecord } from "./json.js";

/**
 * Connection options for the HTTP client.
 *
 * @property token - Pre-obtained credential sent as `Authorization: Bearer <token>`; omitted when empty.
 * @property timeoutMs - Per-request bound; expiry rejects like any other failure.
 * @property adapter - Replacement transport, used to keep tests in-process.
 */
export interface HttpClientOptions {
  readonly baseUrl: string;
  readonly token?: string;
  readonly timeoutMs: number;
  readonly userAgent: string;
  readonly adapter?: AxiosRequestConfig["adapter"];
}

export type QueryParams = Readonly<Record<string, string | number>>;

export interface JsonResponse<T> {
  readonly data: T;
  readonly headers: Record<string, string>;
  readonly status: number;
}

/**
 * Minimal request surface used by the fetcher, enricher, and rate-limit monitor.
 */
export interface HttpClient {
  getJson<T>(url: string, params?: QueryParams): Promise<JsonResponse<T>>;
}

/**
 * Normalised description of a failed request.
 */
export interface HttpFailure {
  readonly status?: number;
  readonly message: string;
  readonly headers: Record<string, string>;
}

function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    } else if (typeof value === "number") {
      out[key.toLowerCase()] = String(value);
    }
  }
  return out;
}

function bodyMessage(data: JsonValue): string | undefined {
  if (isRecord(data)) {
    return typeof data.message === "string" ? data.message : undefined;
  }
  return typeof data === "string" && data.length > 0 ? data : undefined;
}

/**
 * Reduce any thrown value to status, message, and response headers.
 *
 * GitHub error bodies carry a `message` field; it is preferred over the transport message.
 */
export function describeHttpError(cause: unknown): HttpFailure {
  if (axios.isAxiosError<JsonValue>(cause)) {
    const response = cause.response;
    return {
      status: response?.status,
      message: (response ? bodyMessage(response.data) : undefined) ?? cause.message,
      headers: response ? normaliseHeaders(response.headers) : {}
    };
  }
  return {
    message: cause instanceof Error ? cause.message : String(cause),
    headers: {}
  };
}

/**
 * Create an axios-backed client for the GitHub REST API.
 */
export function createHttpClient(options: HttpClientOptions): HttpClient {
  const headers: Record<string, string> = {
    "User-Agent": options.userAgent,
    Accept: "application/vnd.github+json"
  };
  if (options.token) {
    headers.Authorization = `Bearer ${options.token}`;
  }

  const instance: AxiosInstance = axios.create({
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    maxRedirects: 5,
    headers,
    adapter: options.adapter
  });

  return {
    async getJson<T>(url: string, params?: QueryParams): Promise<JsonResponse<T>> {
      const response = await instance.get<T>(url, { params });
      return {
        data: response.data,
        headers: normaliseHeaders(response.headers),
        status: response.status
      };
    }
  };
}
