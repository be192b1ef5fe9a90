import { Injectable, Logger } from '@nestjs/common';
import { DecodeError } from '../common/errors/analysis.errors';
import { InferenceResult } from '../inference/dto/inference-result.dto';
import { UltralyticsInferenceService } from '../inference/ultralytics-inference.service';
import { ImageAnnotationService } from './services/image-annotation.service';
import { interpretResults, Verdict } from './utils/interpret-results';

export interface AnalysisResult extends Verdict {
  /** PNG bytes with the detections outlined */
  annotatedImage: Buffer;
  rawResponse: InferenceResult;
}

@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    private readonly inferenceService: UltralyticsInferenceService,
    private readonly imageAnnotationService: ImageAnnotationService,
  ) {}

  /**
   * Run one image through inference, interpretation and rendering.
   * Either every step succeeds or the first failure propagates.
   *
   * Only PNG and JPEG are forwarded, whatever the uploader declared.
   *
   * @param declaredMimeType Type reported by the uploader, only logged
   */
  async analyze(
    image: Buffer,
    declaredMimeType: string,
    filename?: string,
  ): Promise<AnalysisResult> {
    const info = await this.imageAnnotationService.probe(image);
    const mimeType = info.mimeType;
    if (!mimeType) {
      throw new DecodeError(
        `Unsupported image format "${info.format}". Only PNG and JPEG images are accepted.`,
      );
    }

    if (mimeType !== declaredMimeType) {
      this.logger.warn(
        `Upload declared as ${declaredMimeType} but decodes as ${mimeType}`,
      );
    }

    const rawResponse = await this.inferenceService.predict(
      image,
      mimeType,
      filename,
    );
    const verdict = interpretResults(rawResponse);

    this.logger.log(
      `${verdict.message} (${verdict.detections.length} detection(s), ${info.width}x${info.height})`,
    );

    const annotatedImage = await this.imageAnnotationService.drawBoundingBoxes(
      image,
      verdict.detections,
      info,
    );

    return { ...verdict, annotatedImage, rawResponse };
  }
}
