import type { RawRecord } from '@domain/entities/RawRecord';
import type { NormalizedRecord, StreamName } from '@domain/entities/StreamSchema';

/**
 * Record Normalizer Interface
 * Layer: Domain
 * Pattern: Adapter Pattern
 *
 * Converts one raw API record into the fixed-schema record of the stream it
 * belongs to. The pipeline (reader → normalizer → ingestion client) only
 * depends on this contract, so a new API family means a new mapping, not a
 * new pipeline.
 */
export interface NormalizedEnvelope {
  stream: StreamName;
  record: NormalizedRecord;
}

export interface IRecordNormalizer {
  normalize(raw: RawRecord): NormalizedEnvelope;
}
