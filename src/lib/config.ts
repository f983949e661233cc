/**
 * Stimulus configuration
 * Defaults merged with overrides, validated once and frozen before the loop starts
 */

import { defaultConfig } from '../config/defaults';
import type { ConfigOverrides, StimulusConfig } from '@/types';
import { ConfigError } from './errors';

// Query-string keys accepted by parseConfigOverrides
const QUERY_KEYS = new Map<string, (value: number) => ConfigOverrides>([
  ['targets', v => ({ targetCount: v })],
  ['tracked', v => ({ trackedPairIndex: v })],
  ['radius', v => ({ ringRadius: v })],
  ['ellipse', v => ({ ellipseScale: v })],
  ['speed', v => ({ speed: v })],
  ['threshold', v => ({ overlapThreshold: v })],
  ['spread', v => ({ phaseSpread: v })],
  ['interval', v => ({ cueInterval: v })],
  ['volume', v => ({ cue: { volume: v } })]
]);

export function resolveConfig(overrides: ConfigOverrides = {}): StimulusConfig {
  const config: StimulusConfig = {
    ...defaultConfig,
    ...stripNested(overrides),
    window: { ...defaultConfig.window, ...overrides.window },
    cue: { ...defaultConfig.cue, ...overrides.cue },
    colors: { ...defaultConfig.colors, ...overrides.colors }
  };
  validateConfig(config);
  return deepFreeze(config);
}

function stripNested(overrides: ConfigOverrides): Omit<ConfigOverrides, 'window' | 'cue' | 'colors'> {
  const { window: _window, cue: _cue, colors: _colors, ...flat } = overrides;
  return flat;
}

export function validateConfig(config: StimulusConfig): void {
  const issues: string[] = [];

  const finite = (name: string, value: number): boolean => {
    if (!Number.isFinite(value)) {
      issues.push(`${name} must be a finite number (got ${value})`);
      return false;
    }
    return true;
  };
  const positive = (name: string, value: number): void => {
    if (finite(name, value) && value <= 0) issues.push(`${name} must be positive (got ${value})`);
  };
  const nonNegative = (name: string, value: number): void => {
    if (finite(name, value) && value < 0) issues.push(`${name} must not be negative (got ${value})`);
  };

  const { targetCount, trackedPairIndex, phaseSpread } = config;
  if (!Number.isInteger(targetCount) || targetCount < 2 || targetCount % 2 !== 0) {
    issues.push(`targetCount must be an even integer >= 2 (got ${targetCount})`);
  } else if (
    !Number.isInteger(trackedPairIndex) ||
    trackedPairIndex < 0 ||
    trackedPairIndex >= targetCount / 2
  ) {
    issues.push(`trackedPairIndex must be an integer in [0, ${targetCount / 2 - 1}] (got ${trackedPairIndex})`);
  }

  if (finite('phaseSpread', phaseSpread) && (phaseSpread < 0 || phaseSpread > 1)) {
    issues.push(`phaseSpread must be within [0, 1] (got ${phaseSpread})`);
  }

  positive('window.width', config.window.width);
  positive('window.height', config.window.height);
  positive('ringRadius', config.ringRadius);
  positive('targetRadius', config.targetRadius);
  positive('shuttleRadius', config.shuttleRadius);
  positive('pointerRadius', config.pointerRadius);
  positive('trackedMarkerRadius', config.trackedMarkerRadius);
  positive('ellipseScale', config.ellipseScale);
  positive('speed', config.speed);
  positive('overlapThreshold', config.overlapThreshold);
  positive('cueInterval', config.cueInterval);
  positive('cue.frequency', config.cue.frequency);
  positive('cue.duration', config.cue.duration);
  positive('expectedRefreshRate', config.expectedRefreshRate);
  nonNegative('targetOutlineWidth', config.targetOutlineWidth);
  nonNegative('shuttleOutlineWidth', config.shuttleOutlineWidth);

  if (finite('cue.volume', config.cue.volume) && (config.cue.volume < 0 || config.cue.volume > 1)) {
    issues.push(`cue.volume must be within [0, 1] (got ${config.cue.volume})`);
  }

  if (issues.length > 0) throw new ConfigError(issues);
}

/**
 * Read overrides from a query string such as `?targets=12&spread=0`.
 * Unknown keys are ignored; known keys must parse as numbers.
 */
export function parseConfigOverrides(params: URLSearchParams): ConfigOverrides {
  const issues: string[] = [];
  let overrides: ConfigOverrides = {};

  for (const [key, raw] of params) {
    const toOverride = QUERY_KEYS.get(key);
    if (!toOverride) continue;
    const value = raw.trim() === '' ? NaN : Number(raw);
    if (!Number.isFinite(value)) {
      issues.push(`query parameter "${key}" is not a number (got "${raw}")`);
      continue;
    }
    const next = toOverride(value);
    overrides = {
      ...overrides,
      ...next,
      cue: { ...overrides.cue, ...next.cue }
    };
  }

  if (issues.length > 0) throw new ConfigError(issues);
  return overrides;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child !== null && typeof child === 'object') deepFreeze(child);
  }
  return Object.freeze(value);
}
