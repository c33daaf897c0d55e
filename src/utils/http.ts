import axios, { AxiosInstance, AxiosRequestConfig, AxiosError } from 'axios';
import { createLogger } from '../core/Logger';
import { DigestCredentials, HttpClientConfig } from '../types/http.types';
import { buildDigestAuthorization, parseDigestChallenge } from './digest';

const logger = createLogger('HTTP');

const DEFAULT_TIMEOUT = 10000;

/**
 * Create an HTTP client with digest authentication and request logging
 */
export function createHttpClient(config: HttpClientConfig): AxiosInstance {
  const axiosConfig: AxiosRequestConfig = {
    baseURL: config.baseURL,
    timeout: config.timeout ?? DEFAULT_TIMEOUT,
    headers: config.headers ?? {},
  };

  const client = axios.create(axiosConfig);

  if (config.auth && config.auth.username !== '') {
    addDigestInterceptor(client, config.auth);
  }

  addLoggingInterceptor(client);

  return client;
}

/**
 * Answer a single 401 digest challenge per request
 */
function addDigestInterceptor(client: AxiosInstance, credentials: DigestCredentials): void {
  client.interceptors.response.use(
    (response) => response,
    async (error: AxiosError) => {
      const config = error.config;

      // A request that already carries credentials was answered once
      if (!config || error.response?.status !== 401 || config.headers.has('Authorization')) {
        return Promise.reject(error);
      }

      const header = error.response.headers['www-authenticate'];
      const challenge = parseDigestChallenge(typeof header === 'string' ? header : undefined);
      if (!challenge) {
        return Promise.reject(error);
      }

      config.headers.set(
        'Authorization',
        buildDigestAuthorization(credentials, challenge, {
          method: config.method ?? 'get',
          uri: config.url ?? '/',
        })
      );

      logger.debug(`Answering digest challenge for ${config.url} (realm: ${challenge.realm})`);
      return client.request(config);
    }
  );
}

/**
 * Add request/response logging interceptor
 */
function addLoggingInterceptor(client: AxiosInstance): void {
  // Request logging
  client.interceptors.request.use(
    (config) => {
      logger.debug(`${config.method?.toUpperCase()} ${config.baseURL}${config.url}`);
      return config;
    },
    (error) => {
      logger.error(`Request error: ${error.message}`);
      return Promise.reject(error);
    }
  );

  // Response logging
  client.interceptors.response.use(
    (response) => {
      logger.debug(
        `${response.config.method?.toUpperCase()} ${response.config.url} - ${response.status}`
      );
      return response;
    },
    (error: AxiosError) => {
      if (error.response) {
        logger.debug(
          `${error.config?.method?.toUpperCase()} ${error.config?.url} - ${error.response.status}`
        );
      } else if (error.request) {
        logger.debug(`${error.config?.method?.toUpperCase()} ${error.config?.url} - No response`);
      }
      return Promise.reject(error);
    }
  );
}

/**
 * Format an Axios error for logging
 */
export function formatHttpError(error: unknown): string {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error.message : 'Unknown error';
  }

  const url = error.config?.url || 'unknown';

  if (error.response) {
    // Server responded with error status
    const { status, statusText } = error.response;
    if (status === 401) {
      return `Authentication failed for ${url}`;
    }
    return `HTTP ${status} ${statusText} for ${url}`;
  } else if (error.request) {
    // Request made but no response received
    if (error.code === 'ECONNREFUSED') {
      return `Connection refused to ${url}`;
    } else if (error.code === 'ETIMEDOUT' || error.code === 'ECONNABORTED') {
      return `Request timed out for ${url}`;
    } else if (error.code === 'ENOTFOUND') {
      return `Host not found for ${url}`;
    }
    return `No response received from ${url}: ${error.code || error.message}`;
  }

  // Error setting up request
  return error.message;
}
