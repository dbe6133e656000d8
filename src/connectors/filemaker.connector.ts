import { AxiosResponse } from "axios";
import { FileMakerConfig } from "../config/config.manager";
import {
  SessionAcquisitionError,
  SessionReleaseError,
  SubmissionError,
} from "../errors/sync.errors";
import {
  FileMakerCreateRequest,
  FileMakerCreateResult,
  FileMakerMessage,
  FileMakerRecordAck,
} from "../types/filemaker.types";
import { TargetRecord } from "../types/sync.types";
import { BaseHttpConnector, ConnectorOptions, TargetSystemClient } from "./base-connector";

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const messagesOf = (body: unknown): FileMakerMessage[] => {
  if (!isObject(body) || !Array.isArray(body.messages)) return [];
  return body.messages.filter(
    (m): m is FileMakerMessage =>
      isObject(m) && typeof m.code === "string" && typeof m.message === "string",
  );
};

const idOf = (value: unknown): string | undefined =>
  typeof value === "string" || typeof value === "number" ? String(value) : undefined;

const toAck = (ack: Record<string, unknown>): FileMakerRecordAck => ({
  recordId: idOf(ack.recordId),
  modId: idOf(ack.modId),
});

/**
 * FileMaker Data API client for one database and layout
 */
export class FileMakerConnector extends BaseHttpConnector implements TargetSystemClient {
  constructor(
    private readonly fmConfig: FileMakerConfig,
    options: Partial<Pick<ConnectorOptions, "httpClient" | "logger">> = {},
  ) {
    super({
      baseURL: `${fmConfig.baseUrl}/fmi/data/vLatest/databases/${encodeURIComponent(fmConfig.database)}`,
      timeoutMs: fmConfig.timeoutMs,
      ...options,
    });
  }

  getSystemName(): string {
    return "FileMaker";
  }

  /* =======================
     Sessions
  ======================= */
  async createSession(signal?: AbortSignal): Promise<string> {
    const { user, password } = this.fmConfig;
    if (!user || !password) {
      throw new SessionAcquisitionError("FileMaker credentials are not configured");
    }

    const basic = Buffer.from(`${user}:${password}`, "utf-8").toString("base64");

    let response: AxiosResponse<unknown>;
    try {
      response = await this.httpClient.post<unknown>(
        "/sessions",
        {},
        {
          headers: {
            "Content-Type": "application/json",
            Authorization: `Basic ${basic}`,
          },
          signal,
        },
      );
    } catch (error) {
      throw new SessionAcquisitionError(this.describeFailure(error), error);
    }

    if (!this.isSuccess(response)) {
      throw new SessionAcquisitionError(
        `Failed to create FileMaker session: ${this.describeStatus(response)}${this.messageDetail(response.data)}`,
      );
    }

    const payload = isObject(response.data) ? response.data.response : undefined;
    const token = isObject(payload) ? payload.token : undefined;

    if (typeof token !== "string" || !token) {
      throw new SessionAcquisitionError("No token found in FileMaker session response");
    }

    return token;
  }

  async closeSession(token: string): Promise<void> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.httpClient.delete<unknown>(
        `/sessions/${encodeURIComponent(token)}`,
        { headers: { Authorization: `Bearer ${token}` } },
      );
    } catch (error) {
      throw new SessionReleaseError(this.describeFailure(error), error);
    }

    if (!this.isSuccess(response)) {
      throw new SessionReleaseError(
        `Failed to close FileMaker session: ${this.describeStatus(response)}`,
      );
    }
  }

  /* =======================
     Records
  ======================= */
  async createRecords(
    token: string,
    records: TargetRecord[],
    signal?: AbortSignal,
  ): Promise<FileMakerCreateResult> {
    const body: FileMakerCreateRequest = {
      records: records.map((fieldData) => ({ fieldData })),
    };

    let response: AxiosResponse<unknown>;
    try {
      response = await this.httpClient.post<unknown>(
        `/layouts/${encodeURIComponent(this.fmConfig.layout)}/records`,
        body,
        {
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${token}`,
          },
          signal,
        },
      );
    } catch (error) {
      throw new SubmissionError(
        `Failed to send to FileMaker: ${this.describeFailure(error)}`,
        records.length,
        error,
      );
    }

    if (!this.isSuccess(response)) {
      throw new SubmissionError(
        `Failed to send to FileMaker: ${this.describeStatus(response)}${this.messageDetail(response.data)}`,
        records.length,
      );
    }

    return this.toCreateResult(response.data);
  }

  /**
   * Acknowledgments come back either as `response.records` (bulk) or as a
   * single `response.recordId`.
   */
  private toCreateResult(body: unknown): FileMakerCreateResult {
    const payload: Record<string, unknown> =
      isObject(body) && isObject(body.response) ? body.response : {};
    const acknowledgments: FileMakerRecordAck[] = [];

    if (Array.isArray(payload.records)) {
      for (const ack of payload.records) {
        acknowledgments.push(isObject(ack) ? toAck(ack) : {});
      }
    } else if (payload.recordId !== undefined && payload.recordId !== null) {
      acknowledgments.push(toAck(payload));
    }

    return { acknowledgments, raw: body };
  }

  private messageDetail(body: unknown): string {
    const [first] = messagesOf(body);
    return first ? ` (${first.code} ${first.message})` : "";
  }
}
