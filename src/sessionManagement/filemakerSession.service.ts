import { Logger } from "winston";
import { TargetSystemClient } from "../connectors/base-connector";
import {
  SessionAcquisitionError,
  SessionReleaseError,
  SyncError,
  describeError,
} from "../errors/sync.errors";
import defaultLogger from "../utils/logger";

/**
 * Scoped FileMaker Data API sessions: one token per sync request,
 * released exactly once on every exit path.
 */
export class FileMakerSessionManager {
  constructor(
    private readonly client: TargetSystemClient,
    private readonly logger: Logger = defaultLogger,
  ) {}

  async acquire(signal?: AbortSignal): Promise<string> {
    try {
      const token = await this.client.createSession(signal);
      this.logger.debug("FileMaker session opened");
      return token;
    } catch (error) {
      if (error instanceof SyncError) throw error;
      throw new SessionAcquisitionError(
        `Failed to create FileMaker session: ${describeError(error)}`,
        error,
      );
    }
  }

  /**
   * Best effort. Failures are logged and dropped: by the time this runs
   * the sync outcome is already decided.
   */
  async release(token: string): Promise<void> {
    try {
      await this.client.closeSession(token);
      this.logger.debug("FileMaker session closed");
    } catch (error) {
      const releaseError =
        error instanceof SessionReleaseError
          ? error
          : new SessionReleaseError(describeError(error), error);

      this.logger.warn("FileMaker session release failed", {
        code: releaseError.code,
        error: releaseError.message,
      });
    }
  }

  /**
   * Runs `work` with a fresh session token. Release is not tied to
   * `signal`, so an aborted request still closes its session.
   */
  async withSession<T>(
    work: (token: string) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const token = await this.acquire(signal);

    try {
      return await work(token);
    } finally {
      await this.release(token);
    }
  }
}
