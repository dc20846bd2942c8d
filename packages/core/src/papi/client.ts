import { HEADERS } from "../constants";
import { ApiClient } from "../session/api-client";
import type { RequestDescriptor } from "../session/request";
import type { SessionResponse } from "../session/response";
import type { OutputSchema, Session } from "../session/session";

export type PapiClientOptions = {
  /** Send ids with their type prefixes (prp_, ctr_, grp_). Defaults to true */
  usePrefixes?: boolean;
};

/**
 * Property API client. Every request carries PAPI-Use-Prefixes.
 */
export class PapiClient extends ApiClient {
  readonly usePrefixes: boolean;

  constructor(session: Session, options: PapiClientOptions = {}) {
    super(session);
    this.usePrefixes = options.usePrefixes ?? true;
  }

  override exec<T>(
    request: RequestDescriptor,
    output?: OutputSchema<T>,
    ...input: unknown[]
  ): Promise<SessionResponse<T>> {
    return super.exec(
      {
        ...request,
        headers: {
          ...request.headers,
          [HEADERS.usePrefixes]: String(this.usePrefixes),
        },
      },
      output,
      ...input
    );
  }
}
