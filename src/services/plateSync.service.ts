import { Logger } from "winston";
import { FileMakerRecordBuilder } from "../builders/filemaker-record.builder";
import { ConfigManager } from "../config/config.manager";
import { FileMakerConnector } from "../connectors/filemaker.connector";
import { ShotGridConnector } from "../connectors/shotgrid.connector";
import { FileMakerSessionManager } from "../sessionManagement/filemakerSession.service";
import { SyncRequest, SynchronizationResult } from "../types/sync.types";
import defaultLogger, { forRequest } from "../utils/logger";
import { EntityFetcherService } from "./entityFetcher.service";
import { SubmissionService, SubmitOptions } from "./submission.service";

export interface PlateSyncDependencies {
  fetcher: EntityFetcherService;
  builder: FileMakerRecordBuilder;
  sessions: FileMakerSessionManager;
  submission: SubmissionService;
  logger?: Logger;
}

/**
 * Sends selected ShotGrid entities to FileMaker: fetch, build, open a
 * session, submit, close the session. Each call is independent; the only
 * shared state is the read-only mapping and configuration.
 */
export class PlateSyncService {
  private static instance?: PlateSyncService;

  private readonly fetcher: EntityFetcherService;
  private readonly builder: FileMakerRecordBuilder;
  private readonly sessions: FileMakerSessionManager;
  private readonly submission: SubmissionService;
  private readonly logger: Logger;

  constructor(deps: PlateSyncDependencies) {
    this.fetcher = deps.fetcher;
    this.builder = deps.builder;
    this.sessions = deps.sessions;
    this.submission = deps.submission;
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * Service wired to the real ShotGrid and FileMaker connectors
   */
  static getInstance(): PlateSyncService {
    if (!PlateSyncService.instance) {
      const config = ConfigManager.getInstance();
      const target = new FileMakerConnector(config.filemaker);

      PlateSyncService.instance = new PlateSyncService({
        fetcher: new EntityFetcherService(new ShotGridConnector(config.shotgrid)),
        builder: new FileMakerRecordBuilder(),
        sessions: new FileMakerSessionManager(target),
        submission: new SubmissionService(target),
      });
    }
    return PlateSyncService.instance;
  }

  async synchronize(request: SyncRequest): Promise<SynchronizationResult> {
    const { entityType, ids, diagnostic, signal } = request;
    const log = forRequest(this.logger, request.requestId);
    const options: SubmitOptions = { diagnostic, fields: this.fetcher.fields };

    if (diagnostic) {
      log.info("Querying ShotGrid fields", { entityType, ids, fields: this.fetcher.fields });
    }

    const entities = await this.fetcher.fetch(entityType, ids, signal);

    if (diagnostic) {
      log.info(`Found ${entities.length} results`, { entities });
    }

    const build = this.builder.build(entities);

    log.info("Built FileMaker records", {
      entityType,
      fetched: entities.length,
      records: build.records.length,
      skipped: build.statuses.length - build.records.length,
    });

    if (build.records.length === 0) {
      return this.submission.summarizeEmpty(build, options);
    }

    signal?.throwIfAborted();

    const result = await this.sessions.withSession(
      (token) => this.submission.submit(token, build, options, signal),
      signal,
    );

    log.info(result.message, {
      requested: result.requested,
      created: result.created,
      skipped: result.skipped,
    });

    return result;
  }
}
