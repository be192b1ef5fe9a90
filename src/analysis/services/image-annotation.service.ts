import { Injectable, Logger } from '@nestjs/common';
import sharp from 'sharp';
import { DecodeError } from '../../common/errors/analysis.errors';
import { Detection } from '../../inference/dto/inference-result.dto';
import { isNormalLabel } from '../constants/labels';

const OUTLINE_WIDTH = 3;
const NORMAL_COLOR = 'rgb(0,128,0)';
const FINDING_COLOR = 'rgb(255,0,0)';

// Formats accepted for analysis
const MIME_BY_FORMAT: Record<string, string> = {
  jpeg: 'image/jpeg',
  png: 'image/png',
};

export interface ImageInfo {
  width: number;
  height: number;
  format: string;
  /** Undefined when the format is not one accepted for analysis */
  mimeType?: string;
}

interface Rectangle {
  left: number;
  top: number;
  right: number;
  bottom: number;
  color: string;
}

@Injectable()
export class ImageAnnotationService {
  private readonly logger = new Logger(ImageAnnotationService.name);

  /**
   * Read dimensions and format from the image header
   * @throws DecodeError if the bytes are not a supported image
   */
  async probe(buffer: Buffer): Promise<ImageInfo> {
    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(buffer).metadata();
    } catch (error) {
      throw new DecodeError(
        `Unable to decode image: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    const { width, height, format } = metadata;
    if (!width || !height || !format) {
      throw new DecodeError('Unable to decode image: missing dimensions');
    }

    return { width, height, format, mimeType: MIME_BY_FORMAT[format] };
  }

  /**
   * Outline every detection that has all four box edges on a copy of the
   * image. Normal findings are green, anything else red.
   *
   * @param info Result of an earlier `probe` of the same buffer; probed
   * again when omitted
   * @returns PNG bytes in RGB
   */
  async drawBoundingBoxes(
    buffer: Buffer,
    detections: readonly Detection[],
    info?: ImageInfo,
  ): Promise<Buffer> {
    const { width, height } = info ?? (await this.probe(buffer));
    const rectangles = detections.flatMap((detection) => {
      const rectangle = toRectangle(detection);
      return rectangle ? [rectangle] : [];
    });

    if (rectangles.length < detections.length) {
      this.logger.warn(
        `Skipped ${detections.length - rectangles.length} detection(s) with incomplete boxes`,
      );
    }

    try {
      let image = sharp(buffer);
      if (rectangles.length > 0) {
        image = image.composite([
          { input: Buffer.from(buildOverlay(width, height, rectangles)) },
        ]);
      }
      return await image.removeAlpha().png().toBuffer();
    } catch (error) {
      throw new DecodeError(
        `Unable to render image: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }
}

function toRectangle(
  detection: Detection | null | undefined,
): Rectangle | null {
  const box = detection?.box;
  if (!box) return null;

  const { x1, y1, x2, y2 } = box;
  if (
    !isCoordinate(x1) ||
    !isCoordinate(y1) ||
    !isCoordinate(x2) ||
    !isCoordinate(y2)
  ) {
    return null;
  }

  return {
    left: Math.min(x1, x2),
    top: Math.min(y1, y2),
    right: Math.max(x1, x2),
    bottom: Math.max(y1, y2),
    color: isNormalLabel(detection?.name) ? NORMAL_COLOR : FINDING_COLOR,
  };
}

function isCoordinate(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Each outline is the box minus its interior, filled with the even-odd
 * rule, so the outline sits inside the box edges. Boxes too small to have
 * an interior are filled solid.
 */
function buildOverlay(
  width: number,
  height: number,
  rectangles: Rectangle[],
): string {
  const shapes = rectangles.map(({ left, top, right, bottom, color }) => {
    const innerLeft = left + OUTLINE_WIDTH;
    const innerTop = top + OUTLINE_WIDTH;
    const innerRight = right - OUTLINE_WIDTH;
    const innerBottom = bottom - OUTLINE_WIDTH;

    if (innerRight <= innerLeft || innerBottom <= innerTop) {
      return `<rect x="${left}" y="${top}" width="${right - left}" height="${bottom - top}" fill="${color}"/>`;
    }

    const outer = `M${left} ${top}H${right}V${bottom}H${left}Z`;
    const inner = `M${innerLeft} ${innerTop}V${innerBottom}H${innerRight}V${innerTop}Z`;
    return `<path d="${outer} ${inner}" fill="${color}" fill-rule="evenodd"/>`;
  });

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">${shapes.join('')}</svg>`;
}
