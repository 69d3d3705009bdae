import type { LayoutConfig, TextBoxFont } from '../types/config.js';
import { ConfigError } from './errors.js';
import { DEFAULT_DPI } from './geometry.js';
import { DEFAULT_CONFIDENCE_THRESHOLD } from './layout/word-filter.js';
import { DEFAULT_LINE_MERGE_THRESHOLD_PX } from './layout/line-grouper.js';
import { DEFAULT_PARAGRAPH_GAP_MULTIPLIER } from './layout/paragraph-grouper.js';

export const DEFAULT_LAYOUT_CONFIG: Readonly<LayoutConfig> = Object.freeze({
  confidenceThreshold: DEFAULT_CONFIDENCE_THRESHOLD,
  languages: 'jpn+eng',
  lineMergeThresholdPx: DEFAULT_LINE_MERGE_THRESHOLD_PX,
  paragraphGapMultiplier: DEFAULT_PARAGRAPH_GAP_MULTIPLIER,
  dpi: DEFAULT_DPI
});

// Japanese-capable face first; the writer falls back when it is missing
export const DEFAULT_TEXT_BOX_FONT: Readonly<TextBoxFont> = Object.freeze({
  name: 'Yu Gothic UI',
  fallbackName: 'Arial',
  sizePt: 11
});

export const ConfigPresets = {
  /** Defaults tuned for 300 dpi scans of slides and printed pages. */
  default: {},

  /** Keeps only confidently recognized words. */
  strict: {
    confidenceThreshold: 70
  },

  /** Keeps faint or stylized text at the cost of more noise. */
  lenient: {
    confidenceThreshold: 20,
    paragraphGapMultiplier: 2
  }
} satisfies Record<string, Partial<LayoutConfig>>;

export type ConfigPreset = keyof typeof ConfigPresets;

function requireFinite(key: keyof LayoutConfig, value: number): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`Invalid ${key}: expected a finite number, got ${String(value)}`, key);
  }
}

export function resolveLayoutConfig(overrides: Partial<LayoutConfig> = {}): LayoutConfig {
  const config = withOverrides(DEFAULT_LAYOUT_CONFIG, overrides);

  requireFinite('confidenceThreshold', config.confidenceThreshold);
  requireFinite('lineMergeThresholdPx', config.lineMergeThresholdPx);
  requireFinite('paragraphGapMultiplier', config.paragraphGapMultiplier);
  requireFinite('dpi', config.dpi);

  if (config.confidenceThreshold < 0 || config.confidenceThreshold > 100) {
    throw new ConfigError(
      `Invalid confidenceThreshold: ${config.confidenceThreshold} is outside 0-100`,
      'confidenceThreshold'
    );
  }
  if (config.lineMergeThresholdPx < 0) {
    throw new ConfigError(
      `Invalid lineMergeThresholdPx: ${config.lineMergeThresholdPx} is negative`,
      'lineMergeThresholdPx'
    );
  }
  if (config.paragraphGapMultiplier < 0) {
    throw new ConfigError(
      `Invalid paragraphGapMultiplier: ${config.paragraphGapMultiplier} is negative`,
      'paragraphGapMultiplier'
    );
  }
  if (config.dpi <= 0) {
    throw new ConfigError(`Invalid dpi: ${config.dpi} must be positive`, 'dpi');
  }
  if (typeof config.languages !== 'string' || config.languages.trim().length === 0) {
    throw new ConfigError('Invalid languages: expected a non-empty string such as "eng"', 'languages');
  }

  return config;
}

export function resolvePreset(preset: ConfigPreset, overrides: Partial<LayoutConfig> = {}): LayoutConfig {
  if (!Object.prototype.hasOwnProperty.call(ConfigPresets, preset)) {
    throw new ConfigError(
      `Unknown preset: ${String(preset)}. Available presets: ${Object.keys(ConfigPresets).join(', ')}`,
      'preset'
    );
  }
  return resolveLayoutConfig(withOverrides(withOverrides(DEFAULT_LAYOUT_CONFIG, ConfigPresets[preset]), overrides));
}

// Unlike a spread, an explicit `undefined` override keeps the base value
function withOverrides(base: Readonly<LayoutConfig>, overrides: Partial<LayoutConfig>): LayoutConfig {
  return {
    confidenceThreshold: overrides.confidenceThreshold ?? base.confidenceThreshold,
    languages: overrides.languages ?? base.languages,
    lineMergeThresholdPx: overrides.lineMergeThresholdPx ?? base.lineMergeThresholdPx,
    paragraphGapMultiplier: overrides.paragraphGapMultiplier ?? base.paragraphGapMultiplier,
    dpi: overrides.dpi ?? base.dpi
  };
}
