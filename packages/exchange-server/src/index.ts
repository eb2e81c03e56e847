/**
 * Exchange server public surface.
 */
export * from './services/ExchangeEngine'
export * from './services/AuthorizationVerifier'
export * from './services/SignatureVerifier'
export * from './services/ReplayGuard'
export * from './services/CapPolicy'
export * from './services/SerialQueue'
export * from './collaborators/ledgers'
export * from './collaborators/InMemoryLedgers'
export * from './collaborators/accessControl'
export * from './bootstrap'
export { createApp } from './http'
export { loadConfig, ConfigSchema } from './config'
export type { AppConfig } from './config'
