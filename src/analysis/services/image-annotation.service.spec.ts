import sharp from 'sharp';
import { DecodeError } from '../../common/errors/analysis.errors';
import { Detection } from '../../inference/dto/inference-result.dto';
import { ImageAnnotationService } from './image-annotation.service';

type Rgb = [number, number, number];

async function whiteImage(format: 'png' | 'jpeg' = 'png'): Promise<Buffer> {
  const image = sharp({
    create: {
      width: 64,
      height: 64,
      channels: 3,
      background: { r: 255, g: 255, b: 255 },
    },
  });
  return format === 'png' ? image.png().toBuffer() : image.jpeg().toBuffer();
}

async function readPixels(
  png: Buffer,
): Promise<(x: number, y: number) => Rgb> {
  const { data, info } = await sharp(png)
    .raw()
    .toBuffer({ resolveWithObject: true });
  return (x, y) => {
    const offset = (y * info.width + x) * info.channels;
    return [data[offset], data[offset + 1], data[offset + 2]];
  };
}

describe('ImageAnnotationService', () => {
  const service = new ImageAnnotationService();
  const WHITE: Rgb = [255, 255, 255];
  const RED: Rgb = [255, 0, 0];
  const GREEN: Rgb = [0, 128, 0];

  describe('probe', () => {
    it('reports dimensions and the detected mime type', async () => {
      await expect(service.probe(await whiteImage('jpeg'))).resolves.toEqual({
        width: 64,
        height: 64,
        format: 'jpeg',
        mimeType: 'image/jpeg',
      });
    });

    it('raises a decode error for bytes that are not an image', async () => {
      await expect(
        service.probe(Buffer.from('definitely not an image')),
      ).rejects.toBeInstanceOf(DecodeError);
    });
  });

  describe('drawBoundingBoxes', () => {
    it('draws a 3 pixel red outline inside the box of a stone', async () => {
      const annotated = await service.drawBoundingBoxes(await whiteImage(), [
        {
          name: 'Stone',
          confidence: 0.9,
          box: { x1: 10, y1: 10, x2: 50, y2: 50 },
        },
      ]);
      const pixel = await readPixels(annotated);

      expect(pixel(9, 30)).toEqual(WHITE);
      expect(pixel(10, 30)).toEqual(RED);
      expect(pixel(12, 30)).toEqual(RED);
      expect(pixel(13, 30)).toEqual(WHITE);
      expect(pixel(30, 10)).toEqual(RED);
      expect(pixel(49, 30)).toEqual(RED);
      expect(pixel(50, 30)).toEqual(WHITE);
      expect(pixel(30, 30)).toEqual(WHITE);
    });

    it('draws a green outline for a normal kidney', async () => {
      const annotated = await service.drawBoundingBoxes(await whiteImage(), [
        {
          name: 'normal kidney',
          confidence: 0.8,
          box: { x1: 10, y1: 10, x2: 50, y2: 50 },
        },
      ]);
      const pixel = await readPixels(annotated);

      expect(pixel(10, 30)).toEqual(GREEN);
      expect(pixel(30, 30)).toEqual(WHITE);
    });

    it('outlines a detection with a non-string label in red', async () => {
      const detection: Detection = JSON.parse(
        '{"name":5,"confidence":0.7,"box":{"x1":10,"y1":10,"x2":50,"y2":50}}',
      );

      const annotated = await service.drawBoundingBoxes(await whiteImage(), [
        detection,
      ]);
      const pixel = await readPixels(annotated);

      expect(pixel(10, 30)).toEqual(RED);
    });

    it('uses the given image info instead of probing again', async () => {
      const source = await whiteImage();
      const info = await service.probe(source);
      const probeSpy = jest.spyOn(service, 'probe');

      await service.drawBoundingBoxes(
        source,
        [{ name: 'Stone', confidence: 0.9, box: { x1: 10, y1: 10, x2: 50, y2: 50 } }],
        info,
      );

      expect(probeSpy).not.toHaveBeenCalled();
      probeSpy.mockRestore();
    });

    it('skips detections with a missing coordinate without failing', async () => {
      const source = await whiteImage();

      const annotated = await service.drawBoundingBoxes(source, [
        { name: 'Stone', confidence: 0.9, box: { x1: 10, y1: 10, x2: 50 } },
        { name: 'Stone', confidence: 0.9, box: { x1: 10, y1: null, x2: 50, y2: 50 } },
        { name: 'Stone', confidence: 0.9 },
      ]);

      expect((await sharp(annotated).raw().toBuffer()).equals(
        await sharp(source).raw().toBuffer(),
      )).toBe(true);
    });

    it('returns the same pixels when there is nothing to draw', async () => {
      const source = await whiteImage();

      const annotated = await service.drawBoundingBoxes(source, []);

      expect((await sharp(annotated).raw().toBuffer()).equals(
        await sharp(source).raw().toBuffer(),
      )).toBe(true);
    });

    it('leaves the caller buffer untouched', async () => {
      const source = await whiteImage();
      const copy = Buffer.from(source);

      await service.drawBoundingBoxes(source, [
        { name: 'Stone', confidence: 0.9, box: { x1: 0, y1: 0, x2: 20, y2: 20 } },
      ]);

      expect(source.equals(copy)).toBe(true);
    });

    it('accepts boxes given with swapped corners', async () => {
      const annotated = await service.drawBoundingBoxes(await whiteImage(), [
        { name: 'Stone', confidence: 0.9, box: { x1: 50, y1: 50, x2: 10, y2: 10 } },
      ]);
      const pixel = await readPixels(annotated);

      expect(pixel(10, 30)).toEqual(RED);
      expect(pixel(30, 30)).toEqual(WHITE);
    });

    it('raises a decode error for bytes that are not an image', async () => {
      await expect(
        service.drawBoundingBoxes(Buffer.from('garbage'), []),
      ).rejects.toBeInstanceOf(DecodeError);
    });
  });
});
