/**
 * ShotGrid REST API (v1) payloads used by the connector
 */

export interface ShotGridAccessToken {
  token_type: string;
  access_token: string;
  expires_in: number;
  refresh_token?: string;
}

export interface ShotGridLinkedEntity {
  id: number;
  type?: string;
  name?: string | null;
  [key: string]: unknown;
}

export interface ShotGridRelationship {
  data?: ShotGridLinkedEntity | ShotGridLinkedEntity[] | null;
  links?: Record<string, string>;
}

export interface ShotGridRecord {
  id: number;
  type: string;
  attributes?: Record<string, unknown>;
  relationships?: Record<string, ShotGridRelationship>;
  links?: Record<string, string>;
}

export interface ShotGridSearchResponse {
  data: ShotGridRecord[];
  links?: Record<string, string>;
}

export type ShotGridFilter = [string, string, unknown];

export interface ShotGridSearchRequest {
  filters: ShotGridFilter[];
  fields: string;
}
