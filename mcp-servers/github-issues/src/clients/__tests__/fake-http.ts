/**
 * In-process axios instance for client tests: requests are answered by a route function
 */

import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface FakeReply {
  status: number;
  data: unknown;
}

export interface FakeHttp {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
}

export function createFakeHttp(route: (config: InternalAxiosRequestConfig) => FakeReply): FakeHttp {
  const requests: InternalAxiosRequestConfig[] = [];

  const http = axios.create({
    baseURL: 'https://api.example.test',
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      requests.push(config);
      const reply = route(config);
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      };
      if (reply.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${reply.status}`,
          'ERR_BAD_REQUEST',
          config,
          null,
          response
        );
      }
      return response;
    },
  });

  return { http, requests };
}

/** Body of a request as sent; axios serializes JSON bodies before the adapter runs */
export function requestBody(config: InternalAxiosRequestConfig): unknown {
  return typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
}
