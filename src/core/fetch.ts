import { Agent, Dispatcher, fetch as undiciFetch } from "undici";

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Dispatcher | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export interface HttpRequestInit {
  headers: Record<string, string>;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

/** The slice of a fetch response the acquirer reads. */
export interface HttpResponse {
  ok: boolean;
  status: number;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type HttpFetch = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export const httpFetch: HttpFetch = (url, init) =>
  undiciFetch(url, {
    method: "GET",
    redirect: "follow",
    headers: init.headers,
    signal: init.signal,
    dispatcher: init.dispatcher,
  });
