/**
 * FileMaker Data API payloads used by the connector
 */
import { TargetRecord } from "./sync.types";

export interface FileMakerMessage {
  code: string;
  message: string;
}

export interface FileMakerRecordAck {
  recordId?: string;
  modId?: string;
}

export interface FileMakerCreateResult {
  acknowledgments: FileMakerRecordAck[];
  /** Response body as FileMaker sent it */
  raw: unknown;
}

export interface FileMakerCreateRequest {
  records: { fieldData: TargetRecord }[];
}
