import { FieldMapping } from "../types/sync.types";

export const SyncConstants = {
  /** ShotGrid entity type used when the caller names none */
  DEFAULT_ENTITY_TYPE: "Element",
  /** Joins the rendered elements of a multi-entity or list field */
  LIST_DELIMITER: ", ",
  /** Stands in for the FileMaker response unless diagnostics were asked for */
  HIDDEN_RESPONSE_PLACEHOLDER: "hidden (debug off)",
  SKIPPED_REASON: "no mapped fields present",
  UNACKNOWLEDGED_REASON: "not acknowledged by target",
} as const;

/**
 * ShotGrid Element -> FileMaker plate layout.
 * Order matters: it is the order fields are queried and written.
 */
export const PLATE_FIELD_MAPPING: readonly FieldMapping[] = [
  {
    sourceFieldCode: "sg_latest_version",
    targetFieldName: "Plate Name",
    reference: { entityType: "Version", subFields: ["code"] },
  },
  { sourceFieldCode: "sg_slate", targetFieldName: "Slate" },
  { sourceFieldCode: "sg_camera_file_name", targetFieldName: "Source File Name" },
  { sourceFieldCode: "sg_source_in", targetFieldName: "Timecode In" },
  { sourceFieldCode: "sg_source_out", targetFieldName: "Timecode Out" },
  { sourceFieldCode: "sg_turnover", targetFieldName: "Turnover Package" },
  { sourceFieldCode: "sg_head_in", targetFieldName: "Head In" },
  { sourceFieldCode: "sg_cut_in", targetFieldName: "Cut In" },
  { sourceFieldCode: "sg_cut_out", targetFieldName: "Cut Out" },
  { sourceFieldCode: "sg_tail_out", targetFieldName: "Tail Out" },
  { sourceFieldCode: "sg_lut", targetFieldName: "LUT" },
  { sourceFieldCode: "description", targetFieldName: "Notes" },
  {
    sourceFieldCode: "shot",
    targetFieldName: "ForeignKey",
    transform: "referenceId",
    reference: { entityType: "Shot", subFields: ["code"] },
  },
];

/**
 * Throws when a table maps one source field twice or two source fields
 * onto the same target field.
 */
export const assertOneToOne = (mapping: readonly FieldMapping[]): void => {
  const sources = new Set<string>();
  const targets = new Set<string>();

  for (const entry of mapping) {
    if (sources.has(entry.sourceFieldCode)) {
      throw new Error(`Duplicate source field in mapping: ${entry.sourceFieldCode}`);
    }
    if (targets.has(entry.targetFieldName)) {
      throw new Error(`Duplicate target field in mapping: ${entry.targetFieldName}`);
    }
    sources.add(entry.sourceFieldCode);
    targets.add(entry.targetFieldName);
  }
};

assertOneToOne(PLATE_FIELD_MAPPING);
