import axios, { type AxiosInstance } from 'axios';

export const createHttpClient = (
  baseURL: string,
  timeoutMs = 10000,
  headers: Record<string, string> = {}
): AxiosInstance => {
  return axios.create({
    baseURL,
    timeout: timeoutMs,
    headers
  });
};

// Callers wrap these in their BackoffRetrier.
export const getJson = async <T>(
  client: AxiosInstance,
  path: string,
  params?: Record<string, string>,
  headers?: Record<string, string>
): Promise<T> => {
  const res = await client.get<T>(path, { params, headers });
  return res.data;
};

export const postJson = async <TReq, TRes>(
  client: AxiosInstance,
  path: string,
  body: TReq,
  headers?: Record<string, string>
): Promise<TRes> => {
  const res = await client.post<TRes>(path, body, { headers });
  return res.data;
};
