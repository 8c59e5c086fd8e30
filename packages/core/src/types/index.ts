/**
 * Checker settings and shared types
 */

/**
 * Checker settings
 */
export interface CheckerSettings {
  /** Template file suffixes to scan, lowercase with a leading dot */
  extensions: string[];
  /** Root-namespace prefixes that mark a values reference */
  valuesPrefixes: string[];
  /** Glob patterns excluded from the scan */
  ignore: string[];
}

/**
 * One chart directory to scan
 */
export interface ChartRoot {
  /** Absolute directory path */
  path: string;
  /** Workload name from the BOM, or the Chart.yaml name */
  name?: string;
  origin: 'argument' | 'bom';
}

/**
 * Default settings
 */
export const defaultSettings: CheckerSettings = {
  extensions: ['.yaml', '.yml', '.tpl'],
  valuesPrefixes: ['.Values'],
  ignore: ['**/node_modules/**', '**/.git/**'],
};

function normalizeExtension(ext: string): string {
  const trimmed = ext.trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

// ".Values." and ".Values" name the same namespace
function normalizePrefix(prefix: string): string {
  return prefix.trim().replace(/\.+$/, '');
}

function orDefault(values: string[] | undefined, fallback: string[]): string[] {
  const cleaned = (values ?? []).map(v => v.trim()).filter(v => v.length > 0);
  return cleaned.length > 0 ? [...new Set(cleaned)] : [...fallback];
}

/**
 * Merges overrides into the defaults. Empty lists fall back to the defaults.
 *
 * @example
 * resolveSettings({ extensions: ['TPL'] }).extensions
 * // => ['.tpl']
 */
export function resolveSettings(overrides: Partial<CheckerSettings> = {}): CheckerSettings {
  return {
    extensions: orDefault(overrides.extensions, defaultSettings.extensions).map(
      normalizeExtension
    ),
    valuesPrefixes: orDefault(
      overrides.valuesPrefixes?.map(normalizePrefix),
      defaultSettings.valuesPrefixes
    ),
    ignore: orDefault(overrides.ignore, defaultSettings.ignore),
  };
}
