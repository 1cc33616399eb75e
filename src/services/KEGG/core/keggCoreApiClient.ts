/**
 * @fileoverview Core HTTP client for the KEGG REST API. Issues exactly one
 * request per call and classifies the outcome as success, failure or timeout.
 * Network errors are caught here and never thrown to callers; retrying is the
 * job of `KeggRequester`.
 * @module src/services/KEGG/core/keggCoreApiClient
 */

import axios, { AxiosInstance } from "axios";
import {
  logger,
  RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import { KeggUrl } from "./keggUrl.js";

export type HttpMethod = "GET" | "HEAD";

export type TransportResult =
  | {
      status: "success";
      statusCode: number;
      textBody: string;
      binaryBody: Buffer;
    }
  | { status: "failed"; statusCode?: number; reason: string }
  | { status: "timeout"; reason: string };

/**
 * Anything able to run one KEGG request. Tests substitute in-process fakes.
 */
export interface KeggTransport {
  execute(
    keggUrl: KeggUrl,
    timeoutMs: number,
    context: RequestContext,
    method?: HttpMethod,
  ): Promise<TransportResult>;
}

const TIMEOUT_ERROR_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

export class KeggCoreApiClient implements KeggTransport {
  private axiosInstance: AxiosInstance;

  /**
   * @param axiosInstance - Injected for tests (custom adapters); a plain
   *   instance is created otherwise.
   */
  constructor(axiosInstance?: AxiosInstance) {
    this.axiosInstance =
      axiosInstance ??
      axios.create({
        responseType: "arraybuffer",
        // Status codes are classified below rather than thrown by axios.
        validateStatus: () => true,
      });
  }

  public async execute(
    keggUrl: KeggUrl,
    timeoutMs: number,
    context: RequestContext,
    method: HttpMethod = "GET",
  ): Promise<TransportResult> {
    const requestContext = requestContextService.createRequestContext({
      ...context,
      operation: "KEGG_HttpRequest",
      url: keggUrl.url,
      method,
    });
    logger.debug(`Making KEGG HTTP request: ${method} ${keggUrl.url}`, requestContext);

    try {
      const response = await this.axiosInstance.request<ArrayBuffer>({
        method,
        url: keggUrl.url,
        timeout: timeoutMs,
        responseType: "arraybuffer",
        validateStatus: () => true,
      });

      if (response.status !== 200) {
        logger.debug(`KEGG responded with status ${response.status}`, {
          ...requestContext,
          status: response.status,
        });
        return {
          status: "failed",
          statusCode: response.status,
          reason: `KEGG responded with status ${response.status}`,
        };
      }

      const binaryBody = toBuffer(response.data);
      return {
        status: "success",
        statusCode: response.status,
        binaryBody,
        textBody: binaryBody.toString("utf-8"),
      };
    } catch (error: unknown) {
      if (axios.isAxiosError(error) && error.code && TIMEOUT_ERROR_CODES.has(error.code)) {
        logger.debug(`KEGG request timed out after ${timeoutMs}ms`, {
          ...requestContext,
          errorCode: error.code,
        });
        return { status: "timeout", reason: error.message };
      }

      const reason = error instanceof Error ? error.message : String(error);
      logger.warning(`KEGG request could not be completed: ${reason}`, requestContext);
      return { status: "failed", reason };
    }
  }
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  if (typeof data === "string") return Buffer.from(data, "utf-8");
  return Buffer.alloc(0);
}
