/** Per-request data threaded through the middleware chain. */
export interface RequestContext {
  requestId: string;
}

export type AppEnv = {
  Variables: {
    requestContext: RequestContext | undefined;
  };
};
