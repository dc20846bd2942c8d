/**
 * EdgeGrid request signing (EG1-HMAC-SHA256).
 */

import { createHash, createHmac, randomUUID } from "node:crypto";
import { HEADERS } from "../constants";
import type { OutgoingRequest } from "../session/request";
import type { Signer } from "../session/signer";
import { truncateUtf8 } from "../utils/encoding";
import {
  type EdgeGridConfig,
  type LoadEdgeGridConfigOptions,
  loadEdgeGridConfig,
} from "./config";

export const SIGNING_ALGORITHM = "EG1-HMAC-SHA256";

export type EdgeGridSignerOptions = {
  now?: () => Date;
  nonce?: () => string;
};

const pad = (value: number) => String(value).padStart(2, "0");

/**
 * `yyyyMMddTHH:mm:ss+0000` in UTC.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}+0000`
  );
}

function hmacBase64(data: string, key: string): string {
  return createHmac("sha256", key).update(data).digest("base64");
}

function canonicalizeHeaders(headers: Headers, names: string[]): string {
  const wanted = new Set(names.map((name) => name.toLowerCase()));
  const lines: string[] = [];
  headers.forEach((value, name) => {
    if (wanted.has(name)) {
      lines.push(`${name}:${value.trim().replace(/\s+/g, " ")}`);
    }
  });
  return lines.join("\t");
}

export class EdgeGridSigner implements Signer {
  readonly host: string;
  private readonly now: () => Date;
  private readonly nonce: () => string;

  constructor(
    private readonly config: EdgeGridConfig,
    options: EdgeGridSignerOptions = {}
  ) {
    this.host = config.host;
    this.now = options.now ?? (() => new Date());
    this.nonce = options.nonce ?? randomUUID;
  }

  static fromEnv(options?: LoadEdgeGridConfigOptions): EdgeGridSigner {
    return new EdgeGridSigner(loadEdgeGridConfig(options));
  }

  sign(request: OutgoingRequest): void {
    const timestamp = formatTimestamp(this.now());
    const authHeader =
      `${SIGNING_ALGORITHM} client_token=${this.config.clientToken};` +
      `access_token=${this.config.accessToken};timestamp=${timestamp};nonce=${this.nonce()};`;

    const data = [
      request.method.toUpperCase(),
      request.url.protocol.replace(/:$/, ""),
      request.url.host,
      `${request.url.pathname}${request.url.search}`,
      canonicalizeHeaders(request.headers, this.config.headersToSign),
      this.contentHash(request),
      authHeader,
    ].join("\t");

    const signingKey = hmacBase64(timestamp, this.config.clientSecret);
    const signature = hmacBase64(data, signingKey);
    request.headers.set(HEADERS.authorization, `${authHeader}signature=${signature}`);
  }

  private contentHash(request: OutgoingRequest): string {
    if (request.method.toUpperCase() !== "POST" || !request.body) {
      return "";
    }
    return createHash("sha256")
      .update(truncateUtf8(request.body, this.config.maxBody))
      .digest("base64");
  }
}
