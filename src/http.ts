import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { DEFAULT_USER_AGENT } from "./constants";

export type HttpClientOptions = {
  baseURL?: string;
  timeout?: number;
  userAgent?: string;
  headers?: Record<string, string>;
  adapter?: AxiosAdapter;
};

export function createHttpClient({
  baseURL,
  timeout = 30000,
  userAgent = process.env.USER_AGENT ?? DEFAULT_USER_AGENT,
  headers = {},
  adapter,
}: HttpClientOptions = {}): AxiosInstance {
  return axios.create({
    baseURL,
    timeout,
    adapter,
    headers: {
      "User-Agent": userAgent,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      ...headers,
    },
  });
}
