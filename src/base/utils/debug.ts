/**
 * Debug configuration module
 * Controls debug output for the moo engine components
 *
 * Debug Levels:
 * - MOO_DEBUG=0 or unset: No debug output (default)
 * - MOO_DEBUG=1: Standard debug output (resolution steps, loaded files)
 * - MOO_DEBUG=2: Verbose debug output (every probed path and skipped unit)
 */

export type DebugLevel = 0 | 1 | 2;

export type DebugComponent = 'config' | 'project' | 'discovery' | 'commands';

export interface DebugConfig {
  components: Record<DebugComponent, DebugLevel>;
}

let cachedConfig: DebugConfig | null = null;

/**
 * Parse debug level from environment variable
 */
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
 * - MOO_DEBUG=0|1|2: Global debug level
 * - MOO_DEBUG_<COMPONENT>=1|2: Component-specific debug level
 */
export function getDebugConfig(): DebugConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const globalLevel = parseDebugLevel(process.env.MOO_DEBUG);

  cachedConfig = {
    components: {
      config: parseDebugLevel(process.env.MOO_DEBUG_CONFIG) || globalLevel,
      project: parseDebugLevel(process.env.MOO_DEBUG_PROJECT) || globalLevel,
      discovery: parseDebugLevel(process.env.MOO_DEBUG_DISCOVERY) || globalLevel,
      commands: parseDebugLevel(process.env.MOO_DEBUG_COMMANDS) || globalLevel,
    },
  };

  return cachedConfig;
}

/**
 * Check if debug is enabled for a specific component (level >= 1)
 */
export function isDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 1;
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
