import { Logger } from "winston";
import { TargetSystemClient } from "../connectors/base-connector";
import { SyncConstants } from "../constants/PlateFieldMapping";
import { SubmissionError, SyncError, describeError } from "../errors/sync.errors";
import { FileMakerCreateResult, FileMakerRecordAck } from "../types/filemaker.types";
import {
  BuildResult,
  EntityStatus,
  SynchronizationResult,
} from "../types/sync.types";
import defaultLogger from "../utils/logger";

export interface SubmitOptions {
  diagnostic: boolean;
  /** ShotGrid fields that were queried, reported with diagnostics */
  fields?: readonly string[];
}

const isAcknowledged = (ack: FileMakerRecordAck | undefined): boolean =>
  ack?.recordId !== undefined && ack.recordId !== "";

/**
 * Folds the builder output and FileMaker's acknowledgments into the
 * reported result. Records and acknowledgments are matched by position.
 */
export const aggregateResult = (
  build: BuildResult,
  acknowledgments: readonly FileMakerRecordAck[] | null,
  rawResponse: unknown,
  options: SubmitOptions,
): SynchronizationResult => {
  let queuedIndex = 0;

  const details: EntityStatus[] = build.statuses.map((status): EntityStatus => {
    if (status.status !== "queued" || acknowledgments === null) return { ...status };

    const ack = acknowledgments[queuedIndex++];
    return isAcknowledged(ack)
      ? { ...status, status: "created" }
      : { ...status, status: "failed", reason: SyncConstants.UNACKNOWLEDGED_REASON };
  });

  const requested = build.records.length;
  const created = acknowledgments ? acknowledgments.filter(isAcknowledged).length : 0;
  const skipped = build.statuses.filter((s) => s.status === "skipped").length;

  const result: SynchronizationResult = {
    ok: true,
    message:
      requested === 0
        ? "No records to send to FileMaker."
        : `Sent ${requested} records to FileMaker.`,
    requested,
    created,
    skipped,
    details,
    targetResponse: options.diagnostic
      ? rawResponse
      : SyncConstants.HIDDEN_RESPONSE_PLACEHOLDER,
  };

  if (options.diagnostic) {
    result.diagnostics = {
      fields: [...(options.fields ?? [])],
      records: build.records,
    };
  }

  return result;
};

export class SubmissionService {
  constructor(
    private readonly client: TargetSystemClient,
    private readonly logger: Logger = defaultLogger,
  ) {}

  /**
   * Nothing to send: report the skips without touching FileMaker
   */
  summarizeEmpty(build: BuildResult, options: SubmitOptions): SynchronizationResult {
    return aggregateResult(build, null, null, options);
  }

  async submit(
    token: string,
    build: BuildResult,
    options: SubmitOptions,
    signal?: AbortSignal,
  ): Promise<SynchronizationResult> {
    if (build.records.length === 0) {
      return this.summarizeEmpty(build, options);
    }

    let response: FileMakerCreateResult;
    try {
      response = await this.client.createRecords(token, build.records, signal);
    } catch (error) {
      if (error instanceof SyncError) throw error;
      throw new SubmissionError(
        `Failed to send to FileMaker: ${describeError(error)}`,
        build.records.length,
        error,
      );
    }

    const result = aggregateResult(build, response.acknowledgments, response.raw, options);

    if (result.created !== result.requested) {
      this.logger.warn("FileMaker acknowledged fewer records than were sent", {
        requested: result.requested,
        created: result.created,
      });
    }

    return result;
  }
}
