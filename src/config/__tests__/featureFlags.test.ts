import { describe, expect, it } from 'vitest'
import { getEngineConfig } from '../featureFlags'

describe('getEngineConfig', () => {
  it('turns on flags set to 1', () => {
    expect(getEngineConfig({ UI_ENGINE_TRACKING: '1', UI_ENGINE_DEBUG: '0', UI_ENGINE_STRICT_STYLES: '1' })).toEqual({
      tracking: true,
      debug: false,
      strictStyles: true,
    })
  })

  it('defaults everything off', () => {
    expect(getEngineConfig({})).toEqual({ tracking: false, debug: false, strictStyles: false })
    expect(getEngineConfig({ UI_ENGINE_DEBUG: 'true' }).debug).toBe(false)
  })
})
