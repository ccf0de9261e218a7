import type { Locale, LocalizedText, ValueFormat } from './types.js';

const DAY_UNIT: LocalizedText = { en: 'days', ar: 'يوم' };

export function formatValue(value: number, format: ValueFormat, locale: Locale): string {
  if (Number.isNaN(value)) {
    return 'N/A';
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? '∞' : '-∞';
  }

  switch (format) {
    case 'percent':
      return `${(value * 100).toFixed(1)}%`;
    case 'times':
      return `${value.toFixed(2)}x`;
    case 'days':
      return `${value.toFixed(0)} ${DAY_UNIT[locale]}`;
    case 'ratio':
    default:
      return value.toFixed(2);
  }
}

/** Replaces `{name}` placeholders; unknown placeholders are left as written. */
export function renderTemplate(template: string, vars: Readonly<Record<string, string>>): string {
  return template.replace(/\{(\w+)\}/g, (match: string, key: string) => vars[key] ?? match);
}
