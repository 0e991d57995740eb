/**
 * Read a metric from a record-shaped value. Missing, blank and non-numeric
 * values read as 0.
 */
export function toMetricValue(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

/**
 * Weight is only meaningful when positive; anything else means "not weighed".
 */
export function toWeightValue(value: unknown): number | null {
  const weight = toMetricValue(value);
  return weight > 0 ? weight : null;
}
