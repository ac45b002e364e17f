/**
 * Entity Reference & Scope
 * Layer: Domain
 *
 * An EntityReference names one monitored object for the duration of a run.
 * Pipelines, dataflows and datasets are addressed through their workspace,
 * so child references always carry `workspaceId`.
 *
 * Scope replaces the old "empty list means everything" convention with an
 * explicit variant: `all` asks the Discovery Resolver to list what exists,
 * `explicit` is taken verbatim from configuration.
 */
import type { CHILD_ENTITY_KINDS, ENTITY_KINDS } from '@shared/constants';

export type EntityKind = (typeof ENTITY_KINDS)[number];
export type ChildEntityKind = (typeof CHILD_ENTITY_KINDS)[number];

export interface EntityReference {
  readonly id: string;
  readonly kind: EntityKind;
  /** Parent workspace; set for Pipeline, Dataflow and Dataset. */
  readonly workspaceId?: string;
  readonly displayName?: string;
}

export type Scope = { type: 'all' } | { type: 'explicit'; ids: string[] };

export function isChildKind(kind: EntityKind): kind is ChildEntityKind {
  return kind === 'Pipeline' || kind === 'Dataflow' || kind === 'Dataset';
}

/** Stable label used in logs and RunResult ("Pipeline ws-1/pl-9"). */
export function entityLabel(entity: EntityReference): string {
  return entity.workspaceId
    ? `${entity.kind} ${entity.workspaceId}/${entity.id}`
    : `${entity.kind} ${entity.id}`;
}

export function entityKey(entity: EntityReference): string {
  return `${entity.kind}:${entity.workspaceId ?? ''}:${entity.id}`;
}
