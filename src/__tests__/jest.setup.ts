/**
 * Jest Global Setup
 *
 * Runs before every test file. The `reflect-metadata` import is required
 * because tsyringe's decorators (@injectable, @inject) rely on the Reflect
 * API to store constructor parameter metadata at class-definition time.
 *
 * The environment is pinned before src/core/config.ts is first imported, so
 * test output stays quiet and no test ever picks up a developer's .env
 * endpoints or credentials.
 */
import 'reflect-metadata';

process.env.LOG_LEVEL = 'silent';
process.env.NODE_ENV = 'test';
process.env.INGESTION_ENDPOINT = 'https://dce.test.invalid';
process.env.INGESTION_RULE_ID = 'dcr-test';
process.env.FABRIC_ACCESS_TOKEN = 'test-token';
process.env.AZURE_TENANT_ID = '';
process.env.AZURE_CLIENT_ID = '';
process.env.AZURE_CLIENT_SECRET = '';
process.env.COLLECT_INTERVAL_MINUTES = '0';
