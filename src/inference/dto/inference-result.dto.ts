/**
 * Response shapes of the Ultralytics hosted predict API.
 * Everything is optional: the payload comes from a third party.
 */

/**
 * Box edges in source-image pixel space
 */
export interface DetectionBox {
  x1?: number | null;
  y1?: number | null;
  x2?: number | null;
  y2?: number | null;
}

/**
 * A single detected object
 */
export interface Detection {
  /** Class label reported by the model (e.g. "Stone", "normal kidney") */
  name?: string | null;
  /** Confidence score (0.0 to 1.0) */
  confidence?: number | null;
  box?: DetectionBox | null;
  [extra: string]: unknown;
}

/**
 * Detections reported for one submitted image
 */
export interface InferenceImageResult {
  results?: Detection[] | null;
  shape?: number[];
  speed?: Record<string, number>;
  [extra: string]: unknown;
}

export interface InferenceResult {
  images?: InferenceImageResult[] | null;
  metadata?: Record<string, unknown>;
  [extra: string]: unknown;
}
