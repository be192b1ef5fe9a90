export const DEFAULT_API_URL = 'https://predict.ultralytics.com';

// Hosted kidney-stone detection model
export const DEFAULT_MODEL_URL =
  'https://hub.ultralytics.com/models/eAjS72HEB8er9T7UWut0';

export const DEFAULT_TIMEOUT_MS = 60000;

/**
 * Fixed parameters sent with every prediction request.
 */
export const INFERENCE_PARAMS = {
  imgsz: 640,
  conf: 0.25,
  iou: 0.45,
} as const;
