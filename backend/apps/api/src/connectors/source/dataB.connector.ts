/*
|--------------------------------------------------------------------------
| Data B Source Connector
|--------------------------------------------------------------------------
| Raw HTTP GET against the remote Data B endpoint. Status and body are
| returned untouched; deciding what counts as a failure is the fetcher's job.
|--------------------------------------------------------------------------
*/

import axios, { type AxiosInstance } from "axios"

export type RawResponse = {
  status: number
  body: string
}

export interface HttpGetter {
  getText(url: string, timeoutMs: number): Promise<RawResponse>
}

export function createAxiosGetter(
  instance: AxiosInstance = axios.create()
): HttpGetter {
  return {
    async getText(url, timeoutMs) {
      const res = await instance.get<string>(url, {
        timeout: timeoutMs,
        responseType: "text",
        headers: { Accept: "application/json" },
        // non-2xx is handled by the caller, not thrown here
        validateStatus: () => true,
      })
      return {
        status: res.status,
        body: res.data,
      }
    },
  }
}
