export type ServerContextVariables = {
  /** Client address, from X-Forwarded-For when proxies are trusted. */
  clientIp: string | undefined
  remoteIp: string | undefined
  /** Correlation id of the request, also echoed in the response header. */
  requestId: string
}

declare module "hono" {
  // eslint-disable-next-line @typescript-eslint/no-empty-object-type
  interface ContextVariableMap extends ServerContextVariables {}
}
