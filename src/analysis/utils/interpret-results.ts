import {
  Detection,
  InferenceResult,
} from '../../inference/dto/inference-result.dto';
import { isNormalLabel } from '../constants/labels';
import { VERDICT_MESSAGES, VerdictMessage } from '../constants/messages';

export interface Verdict {
  message: VerdictMessage;
  detections: Detection[];
  isPositive: boolean;
}

/**
 * Reduce a prediction payload to a binary verdict.
 *
 * Only the first image group is read. A single detection whose label is
 * outside the normal-label set makes the verdict positive.
 */
export function interpretResults(result: InferenceResult): Verdict {
  const images = Array.isArray(result.images) ? result.images : [];
  if (images.length === 0) {
    return {
      message: VERDICT_MESSAGES.NO_PREDICTION,
      detections: [],
      isPositive: false,
    };
  }

  const firstResults = images[0]?.results;
  const detections = Array.isArray(firstResults) ? firstResults : [];
  if (detections.length === 0) {
    return { message: VERDICT_MESSAGES.NORMAL, detections: [], isPositive: false };
  }

  const hasNonNormal = detections.some(
    (detection) => !isNormalLabel(detection?.name),
  );

  return {
    message: hasNonNormal
      ? VERDICT_MESSAGES.STONE_DETECTED
      : VERDICT_MESSAGES.NORMAL,
    detections,
    isPositive: hasNonNormal,
  };
}
