import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand'

// Lines are tagged by subsystem, e.g. `[resolver] resolved 12 nodes`.
export type LogSink = (line: string) => void

export type LogBufferState = {
  logs: string[]
  clear: () => void
}

export type LogBuffer = {
  sink: LogSink
  lines: () => string[]
  store: StoreApi<LogBufferState>
}

export function createLogBuffer(limit = 200): LogBuffer {
  const store = createStore<LogBufferState>()((set) => ({
    logs: [],
    clear: () => set({ logs: [] }),
  }))
  return {
    sink: (line) => store.setState((s) => ({ logs: [...s.logs, line].slice(-limit) })),
    lines: () => store.getState().logs,
    store,
  }
}

export const consoleLogSink: LogSink = (line) => {
  if (line.includes('warn:')) console.warn(line)
  else console.info(line)
}

export const silentLogSink: LogSink = () => {}

export function tagged(log: LogSink, tag: string): (msg: string) => void {
  return (msg) => log(`[${tag}] ${msg}`)
}
