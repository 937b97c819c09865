export type GatewayErrorCode = "INVALID_PARAMS" | "NOT_FOUND" | "INTERNAL_ERROR";

export interface GatewayError {
  code: GatewayErrorCode;
  message: string;
}

export type RespondFn = (ok: boolean, payload?: unknown, error?: GatewayError) => void;

export interface GatewayRequestContext {
  /** Push an event to every connected client. */
  broadcast: (event: string, data: unknown) => void;
}

export interface GatewayRequestOptions {
  params: unknown;
  respond: RespondFn;
  context: GatewayRequestContext;
}

export type GatewayRequestHandler = (opts: GatewayRequestOptions) => Promise<void>;

export type GatewayRequestHandlers = Record<string, GatewayRequestHandler>;
