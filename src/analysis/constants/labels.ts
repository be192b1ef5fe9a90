/**
 * Labels the model uses for non-pathological findings. Compared after
 * trimming and lower-casing.
 */
export const NORMAL_LABELS: ReadonlySet<string> = new Set([
  'normal kidney',
  'normal_kidney',
  'normal',
]);

/**
 * Labels come from the remote payload, so anything that is not a string
 * normalizes to '' and counts as non-normal.
 */
export function normalizeLabel(name: unknown): string {
  return typeof name === 'string' ? name.trim().toLowerCase() : '';
}

export function isNormalLabel(name: unknown): boolean {
  return NORMAL_LABELS.has(normalizeLabel(name));
}
