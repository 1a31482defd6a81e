import type { AxiosInstance } from 'axios';
import { createHttpClient } from '../../core/http.js';
import { JUPITER_BASE_URL } from './endpoints.js';

export const createJupiterClient = (
  baseUrl: string = JUPITER_BASE_URL,
  timeoutMs = 10000,
  apiKey?: string
): AxiosInstance => {
  return createHttpClient(baseUrl, timeoutMs, apiKey ? { 'x-api-key': apiKey } : {});
};
