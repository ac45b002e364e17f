/**
 * Dependency Injection Container — The Central "Phone Book"
 * Layer: Core
 *
 * The single place where every dependency is wired together: each token
 * (name badge) maps to a concrete implementation, so when a class says
 * "I need the TokenManager" the container hands back the right object.
 *
 * How tsyringe works:
 *   - `reflect-metadata` must be imported first; it lets the decorators
 *     (@inject, @injectable) record constructor parameters at runtime.
 *   - `useValue` registers a pre-built instance (logger, DB pool, HTTP client).
 *   - `useClass` constructs the class on every resolve, injecting its own
 *     dependencies.
 *   - `registerSingleton` constructs once. TokenManager (token cache) and
 *     CollectionService (one-run-at-a-time guard) hold process-wide state and
 *     must be singletons.
 *
 * The credential provider is chosen from configuration: a service principal
 * (AZURE_TENANT_ID + AZURE_CLIENT_ID + AZURE_CLIENT_SECRET) wins over a static
 * FABRIC_ACCESS_TOKEN.
 *
 * Tests override registrations (repository, orchestrator, HTTP dispatcher)
 * before anything resolves them.
 */
import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { RunConfigFactory } from '@application/factories/RunConfigFactory';
import { CollectionService } from '@application/services/CollectionService';
import type { ICredentialProvider } from '@domain/interfaces/ICredentialProvider';
import { ClientSecretCredentialProvider } from '@infrastructure/credentials/ClientSecretCredentialProvider';
import { StaticTokenProvider } from '@infrastructure/credentials/StaticTokenProvider';
import { getDbConnection } from '@infrastructure/database/connection';
import { HttpClient } from '@infrastructure/http/HttpClient';
import { PostgresRunRepository } from '@infrastructure/repositories/PostgresRunRepository';
import {
  CollectionOrchestrator,
  type CollectorSettings,
} from '@workers/collector/CollectionOrchestrator';
import { systemRuntime } from '@workers/collector/runtime';
import { TokenManager } from '@workers/collector/TokenManager';

const collectorSettings: CollectorSettings = {
  apiBaseUrl: config.source.baseUrl,
  sourceScope: config.source.scope,
  ingestion: {
    endpoint: config.ingestion.endpoint,
    ruleId: config.ingestion.ruleId,
    apiVersion: config.ingestion.apiVersion,
    scope: config.ingestion.scope,
  },
};

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.Knex, { useValue: getDbConnection() });
container.register(TOKENS.HttpClient, {
  useValue: new HttpClient({ timeoutMs: config.http.timeoutMs }),
});
container.register<ICredentialProvider>(TOKENS.CredentialProvider, {
  useFactory: instanceCachingFactory<ICredentialProvider>((c) => {
    const { tenantId, clientId, clientSecret, authorityHost, staticToken } = config.credentials;
    if (tenantId && clientId && clientSecret) {
      return new ClientSecretCredentialProvider(c.resolve<HttpClient>(TOKENS.HttpClient), {
        authorityHost,
        tenantId,
        clientId,
        clientSecret,
      });
    }
    return new StaticTokenProvider(staticToken);
  }),
});
container.register(TOKENS.CollectorRuntime, { useValue: systemRuntime });
container.register(TOKENS.CollectorSettings, { useValue: collectorSettings });
container.registerSingleton(TOKENS.TokenManager, TokenManager);
container.register(TOKENS.RunRepository, { useClass: PostgresRunRepository });
container.register(TOKENS.RunConfigFactory, { useValue: new RunConfigFactory(config.collect) });
container.register(TOKENS.CollectionOrchestrator, { useClass: CollectionOrchestrator });
container.registerSingleton(TOKENS.CollectionService, CollectionService);

export { container };
