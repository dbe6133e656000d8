import { isEntityReference } from "../transformers/valueTransform";
import { ShotGridLinkedEntity, ShotGridRecord } from "../types/shotgrid.types";
import { EntityReference, RawValue, SourceEntity } from "../types/sync.types";

/** `shot.Shot.code` -> ["shot", "Shot", "code"] */
const DEEP_FIELD = /^([^.]+)\.([^.]+)\.([^.]+)$/;

export const deepField = (field: string, entityType: string, subField: string): string =>
  `${field}.${entityType}.${subField}`;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toReference = (linked: ShotGridLinkedEntity | Record<string, unknown>): EntityReference | null => {
  if (typeof linked.id !== "number") return null;

  return {
    ...linked,
    id: linked.id,
    type: typeof linked.type === "string" ? linked.type : undefined,
    name: typeof linked.name === "string" ? linked.name : null,
  };
};

/**
 * Why a search result entry cannot be read as a record, or undefined when
 * it can.
 */
export const malformedRecordReason = (record: unknown): string | undefined => {
  if (!isRecord(record) || typeof record.id !== "number") return "record without id";

  const { attributes, relationships } = record;
  if (attributes !== undefined && !isRecord(attributes)) {
    return `record ${record.id} has non-object attributes`;
  }
  if (relationships === undefined) return undefined;
  if (!isRecord(relationships)) {
    return `record ${record.id} has non-object relationships`;
  }

  const broken = Object.keys(relationships).find((field) => !isRecord(relationships[field]));
  return broken === undefined
    ? undefined
    : `record ${record.id} has a malformed ${broken} relationship`;
};

/**
 * Normalizes one ShotGrid attribute value. Objects without an id
 * (url and attachment fields) collapse to their display name.
 */
export const toRawValue = (value: unknown): RawValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) return value.map(toRawValue);
  if (isRecord(value)) {
    return toReference(value) ?? (typeof value.name === "string" ? value.name : null);
  }
  return null;
};

/**
 * Flattens a REST record into `fields`, keyed by ShotGrid field code. Deep
 * field values (`shot.Shot.code`) are folded into the reference they hang
 * off (`shot.code`); the deep keys themselves are not kept.
 */
export const toSourceEntity = (record: ShotGridRecord, fields: readonly string[]): SourceEntity => {
  const attributes = record.attributes ?? {};
  const relationships = record.relationships ?? {};
  const values: Record<string, RawValue> = {};

  for (const field of fields) {
    if (field === "id" || DEEP_FIELD.test(field)) continue;

    if (field in relationships) {
      values[field] = toRawValue(relationships[field].data);
    } else if (field in attributes) {
      values[field] = toRawValue(attributes[field]);
    }
  }

  for (const field of fields) {
    const match = DEEP_FIELD.exec(field);
    if (!match) continue;

    const [, base, , subField] = match;
    const reference = values[base];
    const value = field in attributes ? attributes[field] : relationships[field]?.data;

    if (value !== undefined && isEntityReference(reference)) {
      values[base] = { ...reference, [subField]: toRawValue(value) };
    }
  }

  return Object.freeze({
    id: record.id,
    type: record.type,
    fields: Object.freeze(values),
  });
};
