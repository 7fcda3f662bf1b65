import { Inject, Injectable, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse, isAxiosError } from 'axios';
import type { ErrorMatcher } from '@/domain/breaker';
import { CircuitBreakerError } from '@/domain/breaker';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import { BreakerRegistry } from './breaker-registry.service';
import { parseDependencyUrls } from '@/infrastructure/config';

/** 4xx answers mean the dependency is up and rejected the request. */
export const CLIENT_ERROR_RESPONSES: ErrorMatcher = {
  matches(error: unknown): boolean {
    if (!isAxiosError(error) || !error.response) return false;
    const { status } = error.response;
    return status >= 400 && status < 500;
  },
};

export interface ServiceRequestOptions {
  /** Sends the request without consulting the dependency's breaker. */
  skipBreaker?: boolean;
}

/**
 * HTTP client for calls to other services. Each dependency gets its own
 * breaker from the {@link BreakerRegistry}.
 */
@Injectable()
export class ServiceClient {
  private readonly http: AxiosInstance;
  private readonly baseUrls: Map<string, string>;
  private readonly unavailableMessage: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly registry: BreakerRegistry,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {
    this.http = axios.create({ timeout: 10000 });
    this.baseUrls = parseDependencyUrls(this.configService.get<string>('DEPENDENCY_URLS', ''));
    this.unavailableMessage = this.configService.get<string>(
      'SERVICE_UNAVAILABLE_MESSAGE',
      '{service} is currently unavailable. Please try again later.',
    );
  }

  async request<T>(
    dependency: string,
    config: AxiosRequestConfig,
    options: ServiceRequestOptions = {},
  ): Promise<AxiosResponse<T>> {
    const baseURL = this.baseUrl(dependency);
    const send = () => this.http.request<T>({ baseURL, ...config });

    if (options.skipBreaker) {
      return send();
    }

    const breaker = await this.registry.get(dependency, { excluded: [CLIENT_ERROR_RESPONSES] });
    if (!breaker.excludedErrors.includes(CLIENT_ERROR_RESPONSES)) {
      // Created earlier by someone else, e.g. the service's own breaker at bootstrap
      breaker.addExcludedError(CLIENT_ERROR_RESPONSES);
    }
    try {
      return await breaker.call(send);
    } catch (error) {
      if (error instanceof CircuitBreakerError) {
        this.logger.error('Dependency request blocked by breaker', {
          dependency,
          state: error.state,
          reason: error.message,
          url: config.url,
        });
        throw new ServiceUnavailableException(this.unavailableMessage.replace('{service}', dependency), {
          cause: error,
        });
      }
      throw error;
    }
  }

  async get<T>(dependency: string, url: string, options?: ServiceRequestOptions): Promise<T> {
    const response = await this.request<T>(dependency, { method: 'GET', url }, options);
    return response.data;
  }

  private baseUrl(dependency: string): string {
    const url = this.baseUrls.get(dependency);
    if (!url) {
      throw new Error(`No base URL configured for dependency "${dependency}"`);
    }
    return url;
  }
}
