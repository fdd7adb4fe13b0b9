export type EngineFeatureFlags = {
  tracking: boolean
  debug: boolean
  strictStyles: boolean
}

type Env = Record<string, string | undefined>

// Toggled through the environment, e.g. `UI_ENGINE_TRACKING=1 npm test`.
export function getEngineConfig(env: Env | undefined = defaultEnv()): EngineFeatureFlags {
  if (!env) return { tracking: false, debug: false, strictStyles: false }

  const tracking = (env.UI_ENGINE_TRACKING ?? '0') === '1'
  const debug = (env.UI_ENGINE_DEBUG ?? '0') === '1'
  const strictStyles = (env.UI_ENGINE_STRICT_STYLES ?? '0') === '1'
  return { tracking, debug, strictStyles }
}

function defaultEnv(): Env | undefined {
  if (typeof process === 'undefined') return undefined
  return process.env
}
