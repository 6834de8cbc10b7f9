import type { Context, Middleware } from "../create-server"
import { isNonEmptyString } from "./utils/is-non-empty-string"

const IPV4_MAPPED_PREFIX = "::ffff:"

/**
 * Client address from an X-Forwarded-For chain whose last `trustedProxies`
 * hops are our own proxies. For "client, proxy1, proxy2": 1 gives
 * "proxy1", 2 gives "client".
 */
export function ipFromXForwardedFor(header: string, trustedProxies: number): string | undefined {
  if (trustedProxies <= 0) return undefined

  const hops = header
    .split(",")
    .map((hop) => hop.trim())
    .filter((hop) => hop.length > 0)

  return hops.at(-1 - trustedProxies)
}

function socketAddress(c: Context): string | undefined {
  const raw: unknown = c.env?.incoming?.socket?.remoteAddress

  if (!isNonEmptyString(raw)) return undefined

  const address = raw.trim()

  return address.startsWith(IPV4_MAPPED_PREFIX) ? address.slice(IPV4_MAPPED_PREFIX.length) : address
}

/**
 * Stores `remoteIp` (the socket peer) and `clientIp` on the context.
 * `clientIp` comes from X-Forwarded-For when proxies are trusted and the
 * chain is long enough, else it is the socket peer.
 */
export function clientIpMiddleware(trustedProxies = 0): Middleware {
  return async (c, next) => {
    const remoteIp = socketAddress(c)
    const forwarded = c.req.header("x-forwarded-for")
    const clientIp =
      (isNonEmptyString(forwarded) ? ipFromXForwardedFor(forwarded, trustedProxies) : undefined) ??
      remoteIp

    if (remoteIp !== undefined) c.set("remoteIp", remoteIp)
    if (clientIp !== undefined) c.set("clientIp", clientIp)

    await next()
  }
}
