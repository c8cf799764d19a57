/**
 * Display formatters for the dashboard.
 *
 * Amounts are in millions; ratios are already percentages (LCR 105.3 means 105.3%).
 * Non-finite input returns the fallback string.
 */
import { NO_EXPOSURE_RATIO } from '../config/regulatory';

const groupThousands = (digits: string): string => digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');

/**
 * Format an amount in millions with thousands separators.
 * @param v - Amount in millions (e.g., 12500 for $12,500.0M)
 * @param digits - Number of decimal places
 */
export const formatMillions = (v: number, digits = 1, fallback = 'N/A'): string => {
  if (!Number.isFinite(v)) return fallback;
  const [whole, fraction] = Math.abs(v).toFixed(digits).split('.');
  const body = fraction === undefined ? groupThousands(whole) : `${groupThousands(whole)}.${fraction}`;
  return `${v < 0 ? '-' : ''}$${body}M`;
};

export const formatPct = (v: number, digits = 2, fallback = 'N/A'): string =>
  Number.isFinite(v) ? `${v.toFixed(digits)}%` : fallback;

// LCR/NSFR report 999.9 when there is nothing to cover.
export const formatRatio = (v: number, digits = 1, fallback = 'N/A'): string => {
  if (v === NO_EXPOSURE_RATIO) return 'n/a (no outflows)';
  return formatPct(v, digits, fallback);
};

export const formatInt = (v: number, fallback = '—'): string =>
  Number.isFinite(v) ? `${Math.round(v)}` : fallback;

/**
 * Format a value for chart axis display.
 * Percent axes get a % suffix; amounts switch to bn above 1,000 (millions in, so 1,000 = 1bn).
 */
export const formatAxisValue = (value: number, yLabel?: string): string => {
  if (!Number.isFinite(value)) return '';

  const label = yLabel?.toLowerCase() ?? '';
  if (label.includes('%')) {
    return `${value.toFixed(Math.abs(value) >= 10 ? 0 : 1)}%`;
  }

  const abs = Math.abs(value);
  if (abs >= 1e3) return `$${(value / 1e3).toFixed(abs >= 1e4 ? 0 : 1)}bn`;
  if (abs >= 1) return `$${value.toFixed(abs >= 10 ? 0 : 1)}m`;
  return value.toFixed(2);
};
