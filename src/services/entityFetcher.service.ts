import { Logger } from "winston";
import { SourceSystemClient } from "../connectors/base-connector";
import { PLATE_FIELD_MAPPING } from "../constants/PlateFieldMapping";
import {
  SyncError,
  UpstreamQueryError,
  ValidationError,
  describeError,
} from "../errors/sync.errors";
import { deepField, malformedRecordReason, toSourceEntity } from "../parsers/shotgrid-entity.parser";
import { ShotGridRecord } from "../types/shotgrid.types";
import { FieldMapping, SourceEntity } from "../types/sync.types";
import defaultLogger from "../utils/logger";

/**
 * Fields to request: `id`, then every mapped source field in table order,
 * each reference followed by its deep sub-fields. Duplicates keep their
 * first position.
 */
export const buildFieldList = (mapping: readonly FieldMapping[]): string[] => {
  const fields = new Set<string>(["id"]);

  for (const entry of mapping) {
    fields.add(entry.sourceFieldCode);

    if (entry.reference) {
      const { entityType, subFields } = entry.reference;
      for (const subField of subFields) {
        fields.add(deepField(entry.sourceFieldCode, entityType, subField));
      }
    }
  }

  return [...fields];
};

export class EntityFetcherService {
  readonly fields: readonly string[];

  constructor(
    private readonly client: SourceSystemClient,
    mapping: readonly FieldMapping[] = PLATE_FIELD_MAPPING,
    private readonly logger: Logger = defaultLogger,
  ) {
    this.fields = Object.freeze(buildFieldList(mapping));
  }

  async fetch(
    entityType: string,
    ids: readonly number[],
    signal?: AbortSignal,
  ): Promise<SourceEntity[]> {
    if (ids.length === 0) {
      throw new ValidationError("No valid IDs provided");
    }
    if (!ids.every((id) => Number.isInteger(id) && id > 0)) {
      throw new ValidationError("IDs must be positive integers");
    }

    this.logger.debug("Querying ShotGrid", { entityType, ids, fields: this.fields });

    let records: ShotGridRecord[];
    try {
      records = await this.client.find(
        entityType,
        [["id", "in", [...ids]]],
        [...this.fields],
        signal,
      );
    } catch (error) {
      if (error instanceof SyncError) throw error;
      throw new UpstreamQueryError(`ShotGrid query failed: ${describeError(error)}`, error);
    }

    for (const record of records) {
      const reason = malformedRecordReason(record);
      if (reason !== undefined) {
        throw new UpstreamQueryError(`Malformed ShotGrid search response: ${reason}`);
      }
    }

    return records.map((record) => toSourceEntity(record, this.fields));
  }
}
