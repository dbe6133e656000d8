import { AxiosResponse } from "axios";
import { ShotGridConfig } from "../config/config.manager";
import { UpstreamQueryError } from "../errors/sync.errors";
import {
  ShotGridAccessToken,
  ShotGridFilter,
  ShotGridRecord,
  ShotGridSearchRequest,
  ShotGridSearchResponse,
} from "../types/shotgrid.types";
import { BaseHttpConnector, ConnectorOptions, SourceSystemClient } from "./base-connector";

const SEARCH_CONTENT_TYPE = "application/vnd+shotgun.api3_array+json";
const PAGE_SIZE = 500;
/** Refresh the access token this long before ShotGrid expires it */
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const isAccessToken = (body: unknown): body is ShotGridAccessToken =>
  typeof body === "object" &&
  body !== null &&
  "access_token" in body &&
  typeof body.access_token === "string" &&
  "expires_in" in body &&
  typeof body.expires_in === "number";

const isSearchResponse = (body: unknown): body is ShotGridSearchResponse =>
  typeof body === "object" &&
  body !== null &&
  "data" in body &&
  Array.isArray(body.data);

/**
 * ShotGrid REST API client, authenticated as a script
 * (client_credentials grant). The access token is cached and shared
 * across requests until shortly before it expires.
 */
export class ShotGridConnector extends BaseHttpConnector implements SourceSystemClient {
  private accessToken?: string;
  private tokenExpiry?: Date;

  /** mutex */
  private loginPromise?: Promise<string>;

  constructor(
    private readonly sgConfig: ShotGridConfig,
    options: Partial<Pick<ConnectorOptions, "httpClient" | "logger">> = {},
  ) {
    super({
      baseURL: `${sgConfig.url}/api/v1`,
      timeoutMs: sgConfig.timeoutMs,
      ...options,
    });
  }

  getSystemName(): string {
    return "ShotGrid";
  }

  async find(
    entityType: string,
    filters: ShotGridFilter[],
    fields: string[],
    signal?: AbortSignal,
  ): Promise<ShotGridRecord[]> {
    const token = await this.getAccessToken();
    const body: ShotGridSearchRequest = { filters, fields: fields.join(",") };
    const records: ShotGridRecord[] = [];

    for (let page = 1; ; page++) {
      const response = await this.post(
        `/entity/${encodeURIComponent(entityType)}/_search`,
        body,
        {
          headers: {
            Authorization: `Bearer ${token}`,
            "Content-Type": SEARCH_CONTENT_TYPE,
          },
          params: { "page[size]": PAGE_SIZE, "page[number]": page },
          signal,
        },
      );

      if (response.status === 401) {
        this.invalidateToken(token);
      }
      if (!this.isSuccess(response)) {
        throw new UpstreamQueryError(
          `${this.describeStatus(response)} to ${entityType} query${this.errorDetail(response.data)}`,
        );
      }
      if (!isSearchResponse(response.data)) {
        throw new UpstreamQueryError(`Malformed ${this.getSystemName()} search response`);
      }

      records.push(...response.data.data);

      if (response.data.data.length < PAGE_SIZE) {
        return records;
      }
    }
  }

  /* =======================
     Access token
     (shared login is not tied to any one caller's abort signal)
  ======================= */
  async getAccessToken(): Promise<string> {
    if (
      this.accessToken &&
      this.tokenExpiry &&
      this.tokenExpiry.getTime() > Date.now() + TOKEN_EXPIRY_MARGIN_MS
    ) {
      return this.accessToken;
    }

    if (!this.loginPromise) {
      this.loginPromise = this.login().finally(() => {
        this.loginPromise = undefined;
      });
    }

    return this.loginPromise;
  }

  /**
   * Forget the cached token. Given the token a request was refused with,
   * a newer token fetched meanwhile by another request is kept.
   */
  invalidateToken(refused?: string): void {
    if (refused !== undefined && refused !== this.accessToken) return;
    this.accessToken = undefined;
    this.tokenExpiry = undefined;
  }

  private async login(): Promise<string> {
    this.logger.debug("Authenticating with ShotGrid", {
      scriptName: this.sgConfig.scriptName,
    });

    const form = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: this.sgConfig.scriptName,
      client_secret: this.sgConfig.scriptKey,
    });

    const response = await this.post("/auth/access_token", form.toString(), {
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
    });

    if (!this.isSuccess(response)) {
      throw new UpstreamQueryError(
        `${this.describeStatus(response)} to authentication${this.errorDetail(response.data)}`,
      );
    }
    if (!isAccessToken(response.data)) {
      throw new UpstreamQueryError("ShotGrid authentication response carried no access token");
    }

    this.accessToken = response.data.access_token;
    this.tokenExpiry = new Date(Date.now() + response.data.expires_in * 1000);

    return this.accessToken;
  }

  private async post(
    url: string,
    data: unknown,
    options: {
      headers: Record<string, string>;
      params?: Record<string, number>;
      signal?: AbortSignal;
    },
  ): Promise<AxiosResponse<unknown>> {
    try {
      return await this.httpClient.post<unknown>(url, data, options);
    } catch (error) {
      throw new UpstreamQueryError(this.describeFailure(error), error);
    }
  }

  private errorDetail(body: unknown): string {
    if (
      typeof body !== "object" ||
      body === null ||
      !("errors" in body) ||
      !Array.isArray(body.errors)
    ) {
      return "";
    }

    const first: unknown = body.errors[0];
    if (typeof first !== "object" || first === null) return "";

    if ("detail" in first && typeof first.detail === "string" && first.detail) {
      return `: ${first.detail}`;
    }
    if ("title" in first && typeof first.title === "string" && first.title) {
      return `: ${first.title}`;
    }
    return "";
  }
}
