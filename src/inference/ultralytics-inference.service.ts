import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import FormData from 'form-data';
import { firstValueFrom } from 'rxjs';
import {
  AnalysisError,
  NetworkError,
  ServiceError,
} from '../common/errors/analysis.errors';
import { INFERENCE_PARAMS } from './constants/inference-params';
import { InferenceResult } from './dto/inference-result.dto';
import { UltralyticsConfigService } from './ultralytics-config.service';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

const EXTENSION_BY_MIME: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/png': 'png',
  'image/webp': 'webp',
};

@Injectable()
export class UltralyticsInferenceService {
  private readonly logger = new Logger(UltralyticsInferenceService.name);

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: UltralyticsConfigService,
  ) {}

  /**
   * Send one image to the hosted model and return its raw JSON reply.
   * Single attempt, no retry.
   *
   * @param image Image bytes, sent as-is
   * @param mimeType Content type declared for the uploaded file part
   * @param filename Name of the uploaded file part
   */
  async predict(
    image: Buffer,
    mimeType: string,
    filename?: string,
  ): Promise<InferenceResult> {
    // Fails before anything touches the network
    const apiKey = this.configService.getApiKey();
    const timeoutMs = this.configService.getTimeoutMs();
    const startTime = Date.now();

    const form = new FormData();
    form.append('model', this.configService.getModelUrl());
    form.append('imgsz', String(INFERENCE_PARAMS.imgsz));
    form.append('conf', String(INFERENCE_PARAMS.conf));
    form.append('iou', String(INFERENCE_PARAMS.iou));
    form.append('file', image, {
      filename: uploadFilename(mimeType, filename),
      contentType: mimeType,
    });

    this.logger.log(
      `Sending ${image.length} bytes (${mimeType}) to ${this.configService.getApiUrl()}`,
    );

    try {
      const response = await firstValueFrom(
        this.httpService.post<unknown>(this.configService.getApiUrl(), form, {
          headers: {
            ...form.getHeaders(),
            'x-api-key': apiKey,
          },
          timeout: timeoutMs,
        }),
      );

      if (!isInferenceResult(response.data)) {
        throw new ServiceError(
          'Inference service returned a body that is not a JSON object',
          response.status,
          stringifyBody(response.data),
        );
      }

      this.logger.log(
        `Inference completed in ${Date.now() - startTime}ms (status ${response.status})`,
      );
      return response.data;
    } catch (error) {
      const failure = this.toAnalysisError(error, timeoutMs);
      this.logger.error(
        `Inference failed in ${Date.now() - startTime}ms: ${failure.message}`,
      );
      throw failure;
    }
  }

  private toAnalysisError(error: unknown, timeoutMs: number): AnalysisError {
    if (error instanceof AnalysisError) {
      return error;
    }

    if (isAxiosError(error)) {
      if (error.response) {
        const status = error.response.status;
        return new ServiceError(
          `Inference service returned HTTP ${status}`,
          status,
          stringifyBody(error.response.data),
          { cause: error },
        );
      }
      if (error.code && TIMEOUT_CODES.has(error.code)) {
        return new NetworkError(
          `Inference request timed out after ${timeoutMs / 1000} seconds`,
          true,
          { cause: error },
        );
      }
      return new NetworkError(
        `Could not reach the inference service: ${error.message}`,
        false,
        { cause: error },
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    return new NetworkError(
      `Could not reach the inference service: ${message}`,
      false,
      { cause: error },
    );
  }
}

/**
 * Keep the uploader's base name but make the extension match the
 * declared content type.
 */
function uploadFilename(mimeType: string, filename?: string): string {
  const extension = EXTENSION_BY_MIME[mimeType] || 'jpg';
  const base = (filename || '')
    .replace(/\.[^./\\]*$/, '')
    .replace(/["\r\n]/g, '');
  return `${base || 'upload'}.${extension}`;
}

function isInferenceResult(data: unknown): data is InferenceResult {
  return typeof data === 'object' && data !== null && !Array.isArray(data);
}

function stringifyBody(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (data === undefined || data === null) {
    return '';
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return JSON.stringify(data);
}
