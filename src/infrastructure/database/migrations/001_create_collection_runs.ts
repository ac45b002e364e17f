/**
 * Migration 001 — Create the `collection_runs` Table
 * Layer: Infrastructure (Database)
 *
 * One row per finished collection run. The columns most often filtered or
 * shown in listings (status, mode, window, totals) are real columns; the full
 * RunResult (per-stream counts, skipped scopes, entity failures) is kept as
 * JSONB in `result`.
 *
 *   - `run_id` is UNIQUE: saving the same run twice is a no-op.
 *   - `started_at` is indexed DESC for "most recent runs first".
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('collection_runs', (table) => {
    table.increments('id').primary();
    table.string('run_id', 64).notNullable().unique();
    table.string('status', 20).notNullable();
    table.string('mode', 20).notNullable();
    table.string('detail_level', 10).notNullable();
    table.timestamp('window_start', { useTz: true }).notNullable();
    table.timestamp('window_end', { useTz: true }).notNullable();
    table.timestamp('started_at', { useTz: true }).notNullable();
    table.timestamp('finished_at', { useTz: true }).notNullable();
    table.integer('total_sent').notNullable().defaultTo(0);
    table.integer('total_failed').notNullable().defaultTo(0);
    table.jsonb('result').notNullable();

    table.timestamps(true, true);

    table.index(['started_at'], 'idx_collection_runs_started_at');
    table.index('status', 'idx_collection_runs_status');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('collection_runs');
}
