/**
 * Shared shapes of the plate sync pipeline
 */

export type Scalar = string | number | boolean | null;

/**
 * A link from one ShotGrid record to another. Sub-fields requested as deep
 * fields (e.g. `shot.Shot.code`) are folded in under their own name.
 */
export interface EntityReference {
  id: number;
  type?: string;
  name?: string | null;
  code?: string | null;
  [subField: string]: unknown;
}

export type RawValue = Scalar | EntityReference | RawValue[];

export interface SourceEntity {
  readonly id: number;
  readonly type: string;
  readonly fields: Readonly<Record<string, RawValue>>;
}

/** Value written into a FileMaker field */
export type RenderedValue = string | number;

export type TargetRecord = Record<string, RenderedValue>;

export type FieldTransformName = "referenceId";

export type FieldTransform = (value: RawValue) => RenderedValue | undefined;

export interface ReferenceSpec {
  /** ShotGrid entity type on the other end of the link */
  entityType: string;
  /** Fields of the linked entity to resolve in the same query */
  subFields: readonly string[];
}

export interface FieldMapping {
  sourceFieldCode: string;
  targetFieldName: string;
  transform?: FieldTransformName;
  reference?: ReferenceSpec;
}

export type EntityStatusKind = "queued" | "skipped" | "created" | "failed";

export interface EntityStatus {
  sourceId: number;
  status: EntityStatusKind;
  reason?: string;
  /** Target field names populated for this entity */
  fields?: string[];
}

export interface BuildResult {
  records: TargetRecord[];
  statuses: EntityStatus[];
}

export interface SyncRequest {
  entityType: string;
  ids: number[];
  diagnostic: boolean;
  requestId?: string;
  signal?: AbortSignal;
}

export interface SyncDiagnostics {
  /** ShotGrid fields requested */
  fields: string[];
  records: TargetRecord[];
}

export interface SynchronizationResult {
  ok: boolean;
  message: string;
  requested: number;
  created: number;
  skipped: number;
  details: EntityStatus[];
  /** Raw target response, or a placeholder unless diagnostics were requested */
  targetResponse: unknown;
  diagnostics?: SyncDiagnostics;
}
