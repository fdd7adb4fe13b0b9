import { afterEach, describe, expect, it, vi } from 'vitest'
import { consoleLogSink, createLogBuffer, tagged } from '../log'

describe('createLogBuffer', () => {
  it('keeps the most recent lines up to its limit', () => {
    const buffer = createLogBuffer(2)
    const log = tagged(buffer.sink, 'test')
    log('one')
    log('two')
    log('three')
    expect(buffer.lines()).toEqual(['[test] two', '[test] three'])

    buffer.store.getState().clear()
    expect(buffer.lines()).toEqual([])
  })
})

describe('consoleLogSink', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('routes warnings to console.warn', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    consoleLogSink('[styles] warn: missing style x')
    consoleLogSink('[resolver] resolved home')
    expect(warn).toHaveBeenCalledWith('[styles] warn: missing style x')
    expect(info).toHaveBeenCalledWith('[resolver] resolved home')
  })
})
