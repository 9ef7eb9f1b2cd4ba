/**
 * @ipsec-xfrm/algorithm - Configuration
 *
 * The library never reads the environment on its own. Callers load config once
 * and thread `debuggable` into AlgorithmDescriptor.describe({ revealKey }).
 */

export type AlgorithmConfig = {
  /** Diagnostics may print key material */
  debuggable: boolean;
};

/**
 * Read configuration from environment variables.
 *
 * ALGORITHM_DEBUGGABLE=true (or 1) enables key output in diagnostics.
 */
export function loadAlgorithmConfig(env: NodeJS.ProcessEnv = process.env): AlgorithmConfig {
  const flag = (env.ALGORITHM_DEBUGGABLE || '').trim().toLowerCase();
  return {
    debuggable: flag === 'true' || flag === '1',
  };
}
