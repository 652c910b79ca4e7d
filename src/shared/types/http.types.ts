export interface HttpRequestInit {
  method: "GET" | "POST" | "PUT" | "DELETE";
  headers: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

// node-fetch's default export satisfies this; tests pass an in-process fake.
export type HttpFetch = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;
