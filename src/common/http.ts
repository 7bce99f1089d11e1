import { Agent, fetch, type Dispatcher } from "undici";

const defaultAgent = new Agent({
  keepAliveTimeout: 10_000,
});

export interface HttpResponse {
  status: number;
  statusText: string;
  body: string;
}

export class HttpClient {
  private dispatcher: Dispatcher;

  constructor(opts?: { dispatcher?: Dispatcher }) {
    this.dispatcher = opts?.dispatcher ?? defaultAgent;
  }

  async get(url: string): Promise<HttpResponse> {
    const res = await fetch(url, {
      method: "GET",
      headers: { Accept: "application/json" },
      dispatcher: this.dispatcher,
    });
    return {
      status: res.status,
      statusText: res.statusText,
      body: await res.text(),
    };
  }
}
