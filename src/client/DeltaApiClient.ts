import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import crypto from 'crypto';
import { env } from '../config/env';
import { logger } from '../utils/logger';

export type QueryParams = Record<string, string | number>;

export interface DeltaClientConfig {
  baseUrl: string;
  apiKey?: string;
  apiSecret?: string;
  timeoutMs: number;
}

interface DeltaEnvelope<T> {
  success?: boolean;
  result?: T;
  error?: unknown;
}

export class DeltaApiClient {
  private readonly axiosInstance: AxiosInstance;
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly apiSecret: string | undefined;

  constructor(
    config: DeltaClientConfig = {
      baseUrl: env.DELTA_API_URL,
      apiKey: env.DELTA_API_KEY,
      apiSecret: env.DELTA_API_SECRET,
      timeoutMs: 10000,
    },
  ) {
    // Paths carry their own /v2 prefix.
    this.baseUrl = config.baseUrl.replace(/\/v2\/?$/, '');
    this.apiKey = config.apiKey;
    this.apiSecret = config.apiSecret;

    this.axiosInstance = axios.create({
      baseURL: this.baseUrl,
      timeout: config.timeoutMs,
    });
  }

  public hasCredentials(): boolean {
    return Boolean(this.apiKey && this.apiSecret);
  }

  public async get<T>(path: string, params: QueryParams = {}, auth: boolean = false): Promise<T> {
    return this.request<T>('GET', path, params, undefined, auth);
  }

  public async post<T>(path: string, data: unknown, auth: boolean = true): Promise<T> {
    return this.request<T>('POST', path, {}, data, auth);
  }

  private async request<T>(
    method: 'GET' | 'POST' | 'PUT' | 'DELETE',
    path: string,
    params: QueryParams,
    data: unknown,
    auth: boolean,
  ): Promise<T> {
    const timestamp = Math.floor(Date.now() / 1000).toString();
    const headers: Record<string, string> = {
      'User-Agent': 'fvg-swing-bot',
      'Content-Type': 'application/json',
    };

    let url = path;
    let query: QueryParams = params;

    if (auth) {
      if (!this.apiKey || !this.apiSecret) {
        throw new Error('Delta API Key/Secret not configured for authenticated request');
      }

      // The signature covers the exact query string sent, so build it here
      // with sorted keys and keep axios from serializing params itself.
      let queryString = '';
      const keys = Object.keys(params).sort();
      if (keys.length > 0) {
        queryString = '?' + keys.map((k) => `${k}=${params[k]}`).join('&');
      }

      const payloadString = data === undefined ? '' : JSON.stringify(data);
      const signatureData = method + timestamp + path + queryString + payloadString;

      headers['api-key'] = this.apiKey;
      headers['timestamp'] = timestamp;
      headers['signature'] = this.generateSignature(this.apiSecret, signatureData);

      url = path + queryString;
      query = {};
    }

    try {
      const config: AxiosRequestConfig = { method, url, headers, params: query, data };
      const response = await this.axiosInstance.request<DeltaEnvelope<T>>(config);
      const body = response.data;

      if (body.success === false || body.result === undefined) {
        throw new Error(`Delta API Error: ${JSON.stringify(body.error ?? body)}`);
      }
      return body.result;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        logger.error(
          {
            status: error.response.status,
            data: error.response.data,
            url: error.config?.url,
          },
          'Delta API Request Failed',
        );
      }
      throw error;
    }
  }

  private generateSignature(secret: string, message: string): string {
    return crypto.createHmac('sha256', secret).update(message).digest('hex');
  }
}
