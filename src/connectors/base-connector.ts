import axios, { AxiosInstance, AxiosResponse } from "axios";
import { Logger } from "winston";
import { TargetRecord } from "../types/sync.types";
import { ShotGridFilter, ShotGridRecord } from "../types/shotgrid.types";
import { FileMakerCreateResult } from "../types/filemaker.types";
import defaultLogger from "../utils/logger";

/**
 * Connection settings shared by every HTTP connector
 */
export interface ConnectorOptions {
  baseURL: string;
  timeoutMs: number;
  /** Preconfigured client, e.g. one with an in-process adapter */
  httpClient?: AxiosInstance;
  logger?: Logger;
}

/**
 * Read side: the production tracking system
 */
export interface SourceSystemClient {
  find(
    entityType: string,
    filters: ShotGridFilter[],
    fields: string[],
    signal?: AbortSignal,
  ): Promise<ShotGridRecord[]>;
}

/**
 * Write side: the record store, accessed through token-scoped sessions
 */
export interface TargetSystemClient {
  createSession(signal?: AbortSignal): Promise<string>;
  createRecords(
    token: string,
    records: TargetRecord[],
    signal?: AbortSignal,
  ): Promise<FileMakerCreateResult>;
  closeSession(token: string): Promise<void>;
}

/**
 * Base class for HTTP connectors. Status codes are checked by the
 * connector itself, so every response resolves.
 */
export abstract class BaseHttpConnector {
  protected readonly httpClient: AxiosInstance;
  protected readonly logger: Logger;
  protected readonly timeoutMs: number;

  constructor(options: ConnectorOptions) {
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? defaultLogger;
    this.httpClient =
      options.httpClient ??
      axios.create({
        baseURL: options.baseURL,
        timeout: options.timeoutMs,
        validateStatus: () => true,
        headers: {
          Accept: "application/json",
        },
      });
  }

  /**
   * Get the system name used in log lines and error messages
   */
  abstract getSystemName(): string;

  protected isSuccess(response: AxiosResponse): boolean {
    return response.status >= 200 && response.status < 300;
  }

  /**
   * One-line description of a failed call, without request headers
   */
  protected describeFailure(error: unknown): string {
    if (axios.isCancel(error)) {
      return `${this.getSystemName()} request aborted`;
    }
    if (axios.isAxiosError(error)) {
      if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
        return `${this.getSystemName()} request timed out after ${this.timeoutMs}ms`;
      }
      return `${this.getSystemName()} unreachable: ${error.code ?? error.message}`;
    }
    return error instanceof Error ? error.message : String(error);
  }

  protected describeStatus(response: AxiosResponse): string {
    return `${this.getSystemName()} responded ${response.status}${
      response.statusText ? ` ${response.statusText}` : ""
    }`;
  }
}
