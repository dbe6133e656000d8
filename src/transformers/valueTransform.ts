import { SyncConstants } from "../constants/PlateFieldMapping";
import {
  EntityReference,
  FieldMapping,
  FieldTransform,
  FieldTransformName,
  RawValue,
  RenderedValue,
} from "../types/sync.types";

export const isEntityReference = (value: unknown): value is EntityReference =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  "id" in value &&
  typeof value.id === "number";

/**
 * Scalar rendering. `undefined` means "no value": the field is left out of
 * the record rather than written empty.
 */
export const renderScalar = (value: unknown): RenderedValue | undefined => {
  if (value === null || value === undefined) return undefined;
  if (typeof value === "string") return value.trim() === "" ? undefined : value;
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "boolean") return value ? 1 : 0;
  return undefined;
};

export const renderReference = (ref: EntityReference): RenderedValue | undefined =>
  renderScalar(ref.name) ?? ref.id;

const renderElement = (value: RawValue): RenderedValue | undefined =>
  isEntityReference(value) ? renderReference(value) : renderScalar(value);

export const renderList = (values: RawValue[]): RenderedValue | undefined => {
  const parts = values
    .map(renderElement)
    .filter((part): part is RenderedValue => part !== undefined)
    .map(String);

  return parts.length ? parts.join(SyncConstants.LIST_DELIMITER) : undefined;
};

export const FIELD_TRANSFORMS: Readonly<Record<FieldTransformName, FieldTransform>> = {
  // Links keyed by id on the FileMaker side, whatever the display name
  referenceId: (value) => {
    if (value === null) return undefined;
    if (!isEntityReference(value)) {
      throw new TypeError(`expected an entity reference, got ${typeof value}`);
    }
    return value.id;
  },
};

/**
 * Renders one raw ShotGrid value for FileMaker. A registered transform wins;
 * otherwise references, lists and scalars are rendered generically.
 * Transform failures propagate; callers decide how to recover.
 */
export const transformValue = (
  mapping: Pick<FieldMapping, "transform">,
  value: RawValue,
): RenderedValue | undefined => {
  if (mapping.transform) {
    return FIELD_TRANSFORMS[mapping.transform](value);
  }
  if (Array.isArray(value)) return renderList(value);
  if (isEntityReference(value)) return renderReference(value);
  return renderScalar(value);
};
