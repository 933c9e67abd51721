import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { HttpRequestError } from '../../errors';
import { AppConfig, FetchOptions, PageFetcher } from '../../types/playlist';
import { logDebug } from '../../utils/logger';

/**
 * Plain GET-as-text fetcher. Non-2xx statuses and transport failures are
 * thrown as HttpRequestError; retrying is left to the caller.
 */
export class AxiosPageFetcher implements PageFetcher {
  private readonly http: AxiosInstance;
  private readonly baseHeaders: Record<string, string>;

  constructor(httpConfig: AppConfig['http'], http?: AxiosInstance) {
    this.http = http ?? axios.create({ timeout: httpConfig.timeoutMs });
    this.baseHeaders = {
      'User-Agent': httpConfig.userAgent,
      'Accept-Language': 'en-US,en',
    };
  }

  async fetchText(url: string, options: FetchOptions = {}): Promise<string> {
    logDebug('http_get_started', { url });
    let response: AxiosResponse<string>;
    try {
      response = await this.http.get<string>(url, {
        headers: { ...this.baseHeaders, ...options.headers },
        responseType: 'text',
        // Keep the body as the server sent it
        transformResponse: (data: unknown) => data,
        validateStatus: () => true,
        ...(options.signal ? { signal: options.signal } : {}),
      });
    } catch (error) {
      throw new HttpRequestError(url, undefined, error);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new HttpRequestError(url, response.status);
    }
    logDebug('http_get_completed', { url, status: response.status });
    return typeof response.data === 'string' ? response.data : String(response.data);
  }
}
