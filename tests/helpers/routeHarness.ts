type RouteHandler = (request: any, response: any) => unknown | Promise<unknown>;
type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface MockResponse {
  statusCode: number;
  body: unknown;
  headers: Record<string, string>;
  chunks: string[];
  ended: boolean;
  status(code: number): MockResponse;
  json(payload: unknown): MockResponse;
  send(payload?: unknown): MockResponse;
  setHeader(name: string, value: string): void;
  getHeader(name: string): string | undefined;
  write(chunk: string): boolean;
  end(): void;
  flushHeaders(): void;
}

export interface MockRequest {
  body: unknown;
  params: Record<string, string>;
  query: Record<string, string>;
  path: string;
  method: string;
  headers: Record<string, string>;
  on(event: string, listener: () => void): MockRequest;
  emit(event: string): void;
}

export type MockRequestInit = Partial<{
  body: unknown;
  params: Record<string, string>;
  query: Record<string, string>;
  path: string;
  method: string;
  headers: Record<string, string>;
}>;

function routeKey(method: string, path: string): string {
  return `${method.toUpperCase()} ${path}`;
}

export function createRouteHarness(): {
  app: {
    get(path: string, handler: RouteHandler): void;
    post(path: string, handler: RouteHandler): void;
    put(path: string, handler: RouteHandler): void;
    delete(path: string, handler: RouteHandler): void;
  };
  route(method: HttpMethod, path: string): RouteHandler;
  hasRoute(method: HttpMethod, path: string): boolean;
} {
  const routes = new Map<string, RouteHandler>();

  const register = (method: HttpMethod) => (path: string, handler: RouteHandler): void => {
    routes.set(routeKey(method, path), handler);
  };

  return {
    app: {
      get: register("GET"),
      post: register("POST"),
      put: register("PUT"),
      delete: register("DELETE")
    },
    route(method, path) {
      const handler = routes.get(routeKey(method, path));
      if (!handler) {
        throw new Error(`Route not registered: ${method} ${path}`);
      }
      return handler;
    },
    hasRoute(method, path) {
      return routes.has(routeKey(method, path));
    }
  };
}

export function createMockResponse(): MockResponse {
  const response: MockResponse = {
    statusCode: 200,
    body: undefined,
    headers: {},
    chunks: [],
    ended: false,
    status(code: number) {
      this.statusCode = code;
      return this;
    },
    json(payload: unknown) {
      this.body = payload;
      return this;
    },
    send(payload?: unknown) {
      this.body = payload;
      return this;
    },
    setHeader(name: string, value: string) {
      this.headers[name.toLowerCase()] = value;
    },
    getHeader(name: string) {
      return this.headers[name.toLowerCase()];
    },
    write(chunk: string) {
      this.chunks.push(chunk);
      return true;
    },
    end() {
      this.ended = true;
    },
    flushHeaders() {}
  };

  return response;
}

export function createMockRequest(init: MockRequestInit = {}): MockRequest {
  const listeners = new Map<string, Array<() => void>>();

  const request: MockRequest = {
    body: init.body ?? {},
    params: init.params ?? {},
    query: init.query ?? {},
    path: init.path ?? "/",
    method: init.method ?? "GET",
    headers: init.headers ?? {},
    on(event, listener) {
      listeners.set(event, [...(listeners.get(event) ?? []), listener]);
      return this;
    },
    emit(event) {
      for (const listener of listeners.get(event) ?? []) {
        listener();
      }
    }
  };

  return request;
}

export async function invokeRoute(handler: RouteHandler, request: MockRequestInit = {}): Promise<MockResponse> {
  const response = createMockResponse();
  await handler(createMockRequest(request), response);
  return response;
}

export async function openStreamingRoute(
  handler: RouteHandler,
  init: MockRequestInit = {}
): Promise<{ request: MockRequest; response: MockResponse }> {
  const request = createMockRequest(init);
  const response = createMockResponse();
  await handler(request, response);
  return { request, response };
}
