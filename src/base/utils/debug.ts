/**
 * Debug configuration module
 * Controls debug output for skillbook components
 *
 * Debug Levels:
 * - SKILLBOOK_DEBUG=0 or unset: No debug output (default)
 * - SKILLBOOK_DEBUG=1: Standard debug output (loads, checks)
 * - SKILLBOOK_DEBUG=2: Verbose debug output (scores, cache hits)
 */

export type DebugLevel = 0 | 1 | 2;

export type DebugComponent =
  | 'registry'
  | 'manifests'
  | 'references'
  | 'consistency'
  | 'matcher'
  | 'config'
  | 'analysis'
  | 'tools';

export interface DebugConfig {
  level: DebugLevel;
  components: Record<DebugComponent, DebugLevel>;
}

let cachedConfig: DebugConfig | null = null;

function parseDebugLevel(value: string | undefined): DebugLevel {
  if (!value) return 0;
  const level = parseInt(value, 10);
  if (level === 2) return 2;
  if (level === 1) return 1;
  return 0;
}

/**
 * Get debug configuration based on environment variables
 *
 * - SKILLBOOK_DEBUG=0|1|2: Global level
 * - SKILLBOOK_DEBUG_<COMPONENT>=1|2: Component-specific level
 */
export function getDebugConfig(): DebugConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const globalLevel = parseDebugLevel(process.env.SKILLBOOK_DEBUG);
  const component = (name: string): DebugLevel =>
    parseDebugLevel(process.env[`SKILLBOOK_DEBUG_${name}`]) || globalLevel;

  cachedConfig = {
    level: globalLevel,
    components: {
      registry: component('REGISTRY'),
      manifests: component('MANIFESTS'),
      references: component('REFERENCES'),
      consistency: component('CONSISTENCY'),
      matcher: component('MATCHER'),
      config: component('CONFIG'),
      analysis: component('ANALYSIS'),
      tools: component('TOOLS'),
    },
  };

  return cachedConfig;
}

/**
 * Check if verbose debug is enabled for a specific component (level >= 2)
 */
export function isVerboseDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 2;
}

/**
 * Reset cached config (useful for testing)
 */
export function resetDebugConfig(): void {
  cachedConfig = null;
}
