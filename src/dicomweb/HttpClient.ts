/**
 * Shared axios setup for the DICOMweb and Orthanc REST clients
 */

import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { DicomWebError } from '../errors.js';

export interface HttpClientOptions {
  baseUrl: string;
  /** Request timeout in ms */
  timeout?: number;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.baseUrl.replace(/\/+$/, ''),
    timeout: options.timeout ?? 30000,
    maxBodyLength: Infinity,
    maxContentLength: Infinity,
    // Status codes are checked by the callers
    validateStatus: () => true,
  });
}

/**
 * Run a request, turning transport failures into DicomWebError
 */
export async function send<T>(instance: AxiosInstance, config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
  const label = `${(config.method ?? 'GET').toUpperCase()} ${config.url ?? ''}`;
  try {
    return await instance.request<T>(config);
  } catch (error) {
    if (axios.isAxiosError(error)) {
      throw new DicomWebError(`${label} failed: ${error.code ?? error.message}`, undefined, { cause: error });
    }
    throw error;
  }
}

export function expectStatus(response: AxiosResponse, label: string, ...accepted: number[]): void {
  if (!accepted.includes(response.status)) {
    throw new DicomWebError(`${label} returned HTTP ${response.status}`, response.status);
  }
}

export function headerValue(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === 'string') {
    return value[0];
  }
  return undefined;
}
