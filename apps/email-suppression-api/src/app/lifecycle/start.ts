import type { LifecycleHook } from "@mailstop/server"
import type { AppContext } from "../create-context"

/** First characters of an OCID, enough to tell tenancies apart in logs. */
export function truncateOcid(ocid: string, length = 20): string {
  return ocid.length > length ? `${ocid.slice(0, length)}...` : ocid
}

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const { config } = context

  return [
    {
      name: "start:banner",
      fn: async () => {
        context.services.core.logger.info(`${config.api.title} v${config.api.version} starting`, {
          service: config.api.title,
          version: config.api.version,
          environment: config.app.env,
          provider: context.infra.suppressionProvider.name,
          region: config.suppressions.region,
          ...(config.oci && { tenancy: truncateOcid(config.oci.tenancyOcid) }),
        })
      },
    },
  ]
}

export type CreateStartHooksFn = typeof createStartHooks
