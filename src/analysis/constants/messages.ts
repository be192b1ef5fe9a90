export const VERDICT_MESSAGES = {
  NO_PREDICTION: 'No prediction available',
  NORMAL: 'Normal Kidney (no stones detected)',
  STONE_DETECTED: 'Kidney Stone Detected',
} as const;

export type VerdictMessage =
  (typeof VERDICT_MESSAGES)[keyof typeof VERDICT_MESSAGES];

export const REQUEST_MESSAGES = {
  MISSING_IMAGE: 'You must provide an image.',
  INVALID_FORMAT: 'Invalid image format. Only PNG, JPG and JPEG are accepted.',
  PRIVACY_NOT_ACCEPTED:
    'You must read and accept the privacy policy before uploading an image.',
} as const;
