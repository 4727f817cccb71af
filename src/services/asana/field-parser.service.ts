import { AsanaCustomField } from '../../types/asana.types';

export type FieldSourceKind = 'canonical' | 'localized' | 'native';
export type DurationUnit = 'hours' | 'minutes';

export interface FieldIdentifier {
  name: string;
  kind: FieldSourceKind;
  /** Unit of numeric values; text values may carry their own */
  unit?: DurationUnit;
}

export type ParseWarningCode = 'conflict' | 'malformed' | 'out_of_range';

export interface ParseWarning {
  code: ParseWarningCode;
  field: string;
  message: string;
}

export interface ParsedField {
  value: number | null;
  source: FieldSourceKind | null;
  field: string | null;
  warnings: ParseWarning[];
}

export interface ParsedTimeFields {
  estimated_time: number | null;
  time_achievement_rate: number | null;
  actual_time_raw: number | null;
  actual_time: number | null;
  unestimated: boolean;
  warnings: ParseWarning[];
}

// Earlier entries win when several fields carry a value.
export const RATE_FIELDS: readonly FieldIdentifier[] = [
  { name: 'time_achievement_rate', kind: 'canonical' },
  { name: '時間達成率', kind: 'localized' },
];

export const ESTIMATE_FIELDS: readonly FieldIdentifier[] = [
  { name: 'estimated_time', kind: 'canonical', unit: 'hours' },
  { name: 'Estimated time', kind: 'localized', unit: 'minutes' },
  { name: '見積もり時間', kind: 'localized', unit: 'minutes' },
];

export const ACTUAL_FIELDS: readonly FieldIdentifier[] = [
  { name: 'actual_time_raw', kind: 'canonical', unit: 'hours' },
  { name: 'Actual time', kind: 'localized', unit: 'minutes' },
  { name: '実績時間', kind: 'localized', unit: 'minutes' },
];

const NUMBER = '[-+]?(?:\\d+(?:\\.\\d+)?|\\.\\d+)';
const DECIMAL_PATTERN = new RegExp(`^${NUMBER}$`);
const PERCENT_PATTERN = new RegExp(`^(${NUMBER})\\s*[%％]$`);
const DURATION_PATTERN = new RegExp(
  `^(${NUMBER})\\s*(h|hr|hrs|hours?|時間|m|min|mins|minutes?|分)?$`,
  'i'
);

type RawValue = number | string;

/**
 * Rate as a fraction: `0.8`, `"0.8"` and `"80%"` all give 0.8. Anything else is absent.
 */
export function parseRateValue(value: RawValue | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;

  const text = value.trim();
  const percent = PERCENT_PATTERN.exec(text);
  if (percent) return Number(percent[1]) / 100;
  if (DECIMAL_PATTERN.test(text)) return Number(text);
  return null;
}

/**
 * Duration in hours. Text may carry a unit (`1.5h`, `2時間`, `90分`, `90min`);
 * bare numbers use `defaultUnit`.
 */
export function parseDurationValue(
  value: RawValue | null | undefined,
  defaultUnit: DurationUnit
): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    return toHours(value, defaultUnit);
  }

  const match = DURATION_PATTERN.exec(value.trim());
  if (!match) return null;
  const amount = Number(match[1]);
  const suffix = match[2]?.toLowerCase();
  if (!suffix) return toHours(amount, defaultUnit);
  return toHours(amount, suffix === '時間' || suffix.startsWith('h') ? 'hours' : 'minutes');
}

function toHours(amount: number, unit: DurationUnit): number {
  return unit === 'minutes' ? amount / 60 : amount;
}

/**
 * First match wins: estimate × rate, else the reported actual, else null (unestimated).
 */
export function deriveActualTime(
  estimatedTime: number | null,
  rate: number | null,
  actualTimeRaw: number | null
): { actual_time: number | null; unestimated: boolean } {
  if (estimatedTime !== null && rate !== null) {
    return { actual_time: estimatedTime * rate, unestimated: false };
  }
  if (actualTimeRaw !== null) {
    return { actual_time: actualTimeRaw, unestimated: false };
  }
  return { actual_time: null, unestimated: true };
}

function rawValueOf(field: AsanaCustomField): RawValue | null {
  if (typeof field.number_value === 'number') return field.number_value;
  const text = field.text_value ?? field.display_value;
  if (typeof text === 'string' && text.trim() !== '') return text;
  return null;
}

function sameName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

export class FieldParserService {
  /**
   * Resolve one logical value from the ordered identifier list.
   */
  readField(
    fields: ReadonlyArray<AsanaCustomField | null>,
    identifiers: readonly FieldIdentifier[],
    parse: (value: RawValue, identifier: FieldIdentifier) => number | null
  ): ParsedField {
    const result: ParsedField = { value: null, source: null, field: null, warnings: [] };

    for (const identifier of identifiers) {
      for (const field of fields) {
        if (!field?.name || !sameName(field.name, identifier.name)) continue;

        const raw = rawValueOf(field);
        if (raw === null) continue;

        const parsed = parse(raw, identifier);
        if (parsed === null) {
          result.warnings.push({
            code: 'malformed',
            field: field.name,
            message: `Ignoring non-numeric value '${String(raw)}' in '${field.name}'`,
          });
          continue;
        }
        if (parsed < 0) {
          result.warnings.push({
            code: 'out_of_range',
            field: field.name,
            message: `Ignoring negative value ${parsed} in '${field.name}'`,
          });
          continue;
        }

        if (result.value === null) {
          result.value = parsed;
          result.source = identifier.kind;
          result.field = field.name;
        } else if (parsed !== result.value) {
          result.warnings.push({
            code: 'conflict',
            field: field.name,
            message: `'${field.name}' (${parsed}) disagrees with '${result.field}' (${result.value}); keeping '${result.field}'`,
          });
        }
      }
    }

    return result;
  }

  /**
   * Normalize a task's time-tracking data. Never throws; problems come back as warnings.
   */
  parse(
    customFields: ReadonlyArray<AsanaCustomField | null> | null | undefined,
    actualTimeMinutes?: number | null
  ): ParsedTimeFields {
    const fields = customFields ?? [];

    const estimate = this.readField(fields, ESTIMATE_FIELDS, (value, id) =>
      parseDurationValue(value, id.unit ?? 'hours')
    );
    const rate = this.readField(fields, RATE_FIELDS, (value) => parseRateValue(value));
    const actual = this.readField(fields, ACTUAL_FIELDS, (value, id) =>
      parseDurationValue(value, id.unit ?? 'hours')
    );

    // Asana's own time tracking is authoritative over a custom field
    let actualTimeRaw = actual.value;
    if (typeof actualTimeMinutes === 'number' && Number.isFinite(actualTimeMinutes) && actualTimeMinutes >= 0) {
      actualTimeRaw = actualTimeMinutes / 60;
    }

    const derived = deriveActualTime(estimate.value, rate.value, actualTimeRaw);

    return {
      estimated_time: estimate.value,
      time_achievement_rate: rate.value,
      actual_time_raw: actualTimeRaw,
      actual_time: derived.actual_time,
      unestimated: derived.unestimated,
      warnings: [...estimate.warnings, ...rate.warnings, ...actual.warnings],
    };
  }
}

export const fieldParserService = new FieldParserService();
