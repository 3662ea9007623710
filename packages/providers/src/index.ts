export * from './pswin/index.js'
export { LoopbackProvider } from './loopback/loopback.js'
export type { LoopbackProviderOptions, LoopbackSimulation } from './loopback/loopback.js'
export {
  createProvider,
  registerProviders,
  type ProviderType,
  type ProviderDefinition,
} from './registry.js'
