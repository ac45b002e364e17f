/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is looked up by one of these Symbols. They are
 * grouped by layer so it is easy to see what exists where; a new service or
 * adapter gets its token here before it is registered in container.ts.
 */
export const TOKENS = {
  // Infrastructure
  Knex: Symbol.for('Knex'),
  Logger: Symbol.for('Logger'),
  HttpClient: Symbol.for('HttpClient'),
  CredentialProvider: Symbol.for('CredentialProvider'),

  // Repositories
  RunRepository: Symbol.for('RunRepository'),

  // Collector runtime
  TokenManager: Symbol.for('TokenManager'),
  CollectorSettings: Symbol.for('CollectorSettings'),
  CollectorRuntime: Symbol.for('CollectorRuntime'),
  CollectionOrchestrator: Symbol.for('CollectionOrchestrator'),

  // Application services
  RunConfigFactory: Symbol.for('RunConfigFactory'),
  CollectionService: Symbol.for('CollectionService'),
} as const;
