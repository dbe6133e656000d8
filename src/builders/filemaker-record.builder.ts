import { Logger } from "winston";
import { PLATE_FIELD_MAPPING, SyncConstants } from "../constants/PlateFieldMapping";
import { TransformError } from "../errors/sync.errors";
import { transformValue } from "../transformers/valueTransform";
import {
  BuildResult,
  EntityStatus,
  FieldMapping,
  RenderedValue,
  SourceEntity,
  TargetRecord,
} from "../types/sync.types";
import defaultLogger from "../utils/logger";

/**
 * Turns fetched ShotGrid entities into FileMaker field data, one record per
 * entity that has at least one mapped value.
 */
export class FileMakerRecordBuilder {
  constructor(
    private readonly mapping: readonly FieldMapping[] = PLATE_FIELD_MAPPING,
    private readonly logger: Logger = defaultLogger,
  ) {}

  build(entities: readonly SourceEntity[]): BuildResult {
    const records: TargetRecord[] = [];
    const statuses: EntityStatus[] = [];

    for (const entity of entities) {
      const record = this.buildRecord(entity);
      const fields = Object.keys(record);

      if (fields.length === 0) {
        statuses.push({
          sourceId: entity.id,
          status: "skipped",
          reason: SyncConstants.SKIPPED_REASON,
        });
        continue;
      }

      records.push(record);
      statuses.push({ sourceId: entity.id, status: "queued", fields });
    }

    return { records, statuses };
  }

  buildRecord(entity: SourceEntity): TargetRecord {
    const record: TargetRecord = {};

    for (const entry of this.mapping) {
      if (!Object.prototype.hasOwnProperty.call(entity.fields, entry.sourceFieldCode)) {
        continue;
      }

      const value = this.renderField(entity, entry);
      if (value !== undefined) {
        record[entry.targetFieldName] = value;
      }
    }

    return record;
  }

  private renderField(entity: SourceEntity, entry: FieldMapping): RenderedValue | undefined {
    try {
      return transformValue(entry, entity.fields[entry.sourceFieldCode]);
    } catch (error) {
      const transformError = new TransformError(entry.sourceFieldCode, error);
      this.logger.debug("Field omitted after transform failure", {
        sourceId: entity.id,
        field: entry.sourceFieldCode,
        error: transformError.message,
      });
      return undefined;
    }
  }
}
