import { newApiError } from "../errors/api-error";
import type { Logger } from "./log";
import type { CallOptions, RequestDescriptor } from "./request";
import type { SessionResponse } from "./response";
import type { OutputSchema, Session } from "./session";

/**
 * Base for endpoint clients: a Session plus the API's error decoding.
 */
export class ApiClient {
  constructor(readonly session: Session) {}

  exec<T>(
    request: RequestDescriptor,
    output?: OutputSchema<T>,
    ...input: unknown[]
  ): Promise<SessionResponse<T>> {
    return this.session.execute(request, output, ...input);
  }

  error(response: SessionResponse) {
    return newApiError(response.body, response.status);
  }

  log(options?: CallOptions): Logger {
    return this.session.log(options);
  }
}
