/**
 * Encoder presets for merged exports.
 * The merge re-encodes with libx264, so quality maps to a CRF / preset pair.
 */

export type ExportQuality = 'high' | 'medium' | 'low';

export interface ExportPreset {
  crf: number;
  preset: string;
}

export const EXPORT_QUALITY_PRESETS: Record<ExportQuality, ExportPreset> = {
  high: { crf: 18, preset: 'slow' },
  medium: { crf: 23, preset: 'medium' },
  low: { crf: 28, preset: 'faster' },
};

/** Quality used when none is configured (favors fast merges over size) */
export const DEFAULT_EXPORT_QUALITY: ExportQuality = 'low';

export function isExportQuality(value: string): value is ExportQuality {
  return Object.prototype.hasOwnProperty.call(EXPORT_QUALITY_PRESETS, value);
}

export function getExportPreset(quality: ExportQuality = DEFAULT_EXPORT_QUALITY): ExportPreset {
  return EXPORT_QUALITY_PRESETS[quality];
}
