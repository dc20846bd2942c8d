import { decodeUtf8 } from "../utils/encoding";

export type SessionResponseInit<T> = {
  status: number;
  statusText: string;
  headers: Headers;
  url: string;
  body: Uint8Array;
  data?: T;
};

/**
 * A fully read response. `data` is set only when an output schema was
 * given and the status carried a decodable body.
 */
export class SessionResponse<T = unknown> {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Headers;
  readonly url: string;
  readonly body: Uint8Array;
  readonly data?: T;

  constructor(init: SessionResponseInit<T>) {
    this.status = init.status;
    this.statusText = init.statusText;
    this.headers = init.headers;
    this.url = init.url;
    this.body = init.body;
    this.data = init.data;
  }

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  text(): string {
    return decodeUtf8(this.body);
  }

  withData<U>(data: U): SessionResponse<U> {
    return new SessionResponse<U>({ ...this.init(), data });
  }

  private init(): SessionResponseInit<never> {
    return {
      status: this.status,
      statusText: this.statusText,
      headers: this.headers,
      url: this.url,
      body: this.body,
    };
  }
}

/** 2xx other than 204 and 205 */
export function expectsBody(status: number): boolean {
  return status >= 200 && status < 300 && status !== 204 && status !== 205;
}
