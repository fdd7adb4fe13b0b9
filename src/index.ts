export * from './state/stateValue'
export * from './state/keypath'
export * from './state/stateStore'
export * from './bindings/evalExpr'
export * from './config/featureFlags'
export * from './logging/log'
export * from './tracking/dependencyTracker'
export * from './tracking/viewTree'
export * from './document/documentTypes'
export * from './document/parseDocument'
export * from './styles/styleResolver'
export * from './registry/registry'
export * from './ir/irTypes'
export * from './ir/debugDump'
export * from './ir/renderTreeValidator'
export * from './resolver/resolutionError'
export * from './resolver/resolutionContext'
export * from './resolver/actionResolver'
export * from './resolver/contentResolver'
export * from './resolver/componentResolvers'
export * from './resolver/layoutResolver'
export * from './resolver/sectionLayoutResolver'
export * from './resolver/resolver'
export * from './runtime/actionRuntime'
export * from './renderer/types'
export * from './renderer/debugRenderer'
export * from './renderer/react/nodeRenderers'
export * from './renderer/react/renderRenderTree'
export * from './renderer/react/styleToCss'
