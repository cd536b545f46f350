import axios, { type AxiosInstance } from 'axios'

import type { HttpClient } from '../contracts/collaborators.js'

/**
 * Options for the axios-backed HTTP client.
 */
export interface AxiosHttpClientOptions {
  /** Preconfigured axios instance, for example with interceptors. */
  readonly instance?: AxiosInstance
  /** Request timeout in milliseconds; 0 waits indefinitely. */
  readonly timeoutMs?: number
}

/**
 * Creates the default HTTP client used by `ping`.
 *
 * Non-2xx responses reject through axios' default status validation.
 *
 * @param options Client options.
 * @returns HTTP client implementation.
 */
export const createAxiosHttpClient = (options: AxiosHttpClientOptions = {}): HttpClient => {
  const instance = options.instance ?? axios.create({ timeout: options.timeoutMs ?? 0 })

  return {
    get: async (url: string, headers: Readonly<Record<string, string>>): Promise<void> => {
      await instance.get(url, {
        headers: { ...headers },
        responseType: 'text',
      })
    },
  }
}
