import type { Gateway, Logger, Provider } from '@smsbridge/core'
import { PswinProvider, type PswinProviderOptions } from './pswin/index.js'
import { LoopbackProvider, type LoopbackProviderOptions } from './loopback/loopback.js'

export type ProviderType = 'pswin' | 'loopback'

/**
 * Provider to create and register under an alias
 */
export type ProviderDefinition =
  | { alias: string; type: 'pswin'; options?: PswinProviderOptions; default?: boolean }
  | { alias: string; type: 'loopback'; options?: LoopbackProviderOptions; default?: boolean }

/**
 * Create a provider by type
 */
export function createProvider(definition: ProviderDefinition, logger?: Logger): Provider {
  switch (definition.type) {
    case 'pswin':
      return new PswinProvider({ logger, ...definition.options })
    case 'loopback':
      return new LoopbackProvider({ logger, ...definition.options })
  }
}

/**
 * Create the configured providers and add them to the gateway, in order
 *
 * @example
 * ```typescript
 * registerProviders(gateway, [
 *   { alias: 'main', type: 'pswin', options: { senderId: 'Acme' } },
 *   { alias: 'dev', type: 'loopback' },
 * ])
 * ```
 */
export function registerProviders(
  gateway: Gateway,
  definitions: readonly ProviderDefinition[],
  logger?: Logger,
): void {
  for (const definition of definitions) {
    const provider = createProvider(
      definition,
      logger?.child({ provider: definition.type, alias: definition.alias }),
    )
    gateway.addProvider(definition.alias, provider, { default: definition.default })
  }
}
