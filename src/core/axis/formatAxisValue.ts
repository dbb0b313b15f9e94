import { createTickFormatter, formatTickValue } from './computeAxisTicks';

export interface FormatAxisValueOptions {
  /** Tick step used to pick the number of fraction digits (default: 1). */
  readonly step?: number;
  /** Replace values above one thousand / one million with a K / M suffix. */
  readonly shortenLargeNumbers?: boolean;
  readonly locale?: string;
}

const MILLION = 1e6;
const THOUSAND = 1e3;

/**
 * Formats a value-axis label.
 *
 * With `shortenLargeNumbers`, the value is rounded first and anything whose
 * magnitude exceeds 1e6 (or 1e3) is truncated to whole millions (thousands):
 * 2_500_000 → "2M", 1_999 → "1K". Smaller values, and every value when
 * shortening is off, go through the step-aware tick formatter.
 *
 * Non-finite values format as an empty string.
 */
export function formatAxisValue(value: number, options: FormatAxisValueOptions = {}): string {
  if (!Number.isFinite(value)) return '';

  if (options.shortenLargeNumbers) {
    const rounded = Math.round(value);
    const magnitude = Math.abs(rounded);
    if (magnitude > MILLION) return `${Math.trunc(rounded / MILLION)}M`;
    if (magnitude > THOUSAND) return `${Math.trunc(rounded / THOUSAND)}K`;
  }

  const nf = createTickFormatter(options.step ?? 1, options.locale);
  return formatTickValue(nf, value) ?? '';
}
