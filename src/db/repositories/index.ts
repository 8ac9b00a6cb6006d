export { ApiKeysRepository, type CreateApiKeyInput } from './apiKeysRepository.js'
export { UsageRepository } from './usageRepository.js'
export type { Queryable } from './queryable.js'
