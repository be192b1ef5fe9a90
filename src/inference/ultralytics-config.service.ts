import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '../common/errors/analysis.errors';
import {
  DEFAULT_API_URL,
  DEFAULT_MODEL_URL,
  DEFAULT_TIMEOUT_MS,
} from './constants/inference-params';

@Injectable()
export class UltralyticsConfigService {
  private readonly logger = new Logger(UltralyticsConfigService.name);
  private readonly apiKey: string;
  private readonly apiUrl: string;
  private readonly modelUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.apiKey = (
      this.configService.get<string>('ULTRALYTICS_API_KEY') || ''
    ).trim();
    this.apiUrl =
      this.configService.get<string>('ULTRALYTICS_API_URL') || DEFAULT_API_URL;
    this.modelUrl =
      this.configService.get<string>('ULTRALYTICS_MODEL_URL') ||
      DEFAULT_MODEL_URL;
    this.timeoutMs =
      this.configService.get<number>('ULTRALYTICS_TIMEOUT_MS') ||
      DEFAULT_TIMEOUT_MS;

    if (!this.apiKey) {
      this.logger.warn(
        'ULTRALYTICS_API_KEY not configured. Image analysis requests will be rejected.',
      );
    }
  }

  /**
   * @throws ConfigurationError when no API key is configured
   */
  getApiKey(): string {
    if (!this.apiKey) {
      throw new ConfigurationError(
        'Ultralytics API key is missing. Set the ULTRALYTICS_API_KEY environment variable.',
      );
    }
    return this.apiKey;
  }

  getApiUrl(): string {
    return this.apiUrl;
  }

  getModelUrl(): string {
    return this.modelUrl;
  }

  getTimeoutMs(): number {
    return this.timeoutMs;
  }

  isConfigured(): boolean {
    return !!this.apiKey;
  }
}
