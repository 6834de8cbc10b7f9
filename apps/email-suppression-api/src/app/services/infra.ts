import {
  MemorySuppressionProvider,
} from "../../domains/suppressions/infra/suppression-provider.memory"
import { createOciEmailClient } from "../../domains/suppressions/infra/email-client.oci"
import { OciSuppressionProvider } from "../../domains/suppressions/infra/suppression-provider.oci"
import type { SuppressionProvider } from "../../domains/suppressions/model/suppression.model"
import type { AppConfig } from "../config"

export type InfraClients = {
  suppressionProvider: SuppressionProvider
}

export async function createDefaultInfraClients(config: AppConfig): Promise<InfraClients> {
  if (config.suppressions.provider === "memory" || !config.oci) {
    return { suppressionProvider: new MemorySuppressionProvider() }
  }

  const client = await createOciEmailClient(config.oci)

  return {
    suppressionProvider: new OciSuppressionProvider(client, {
      compartmentId: config.oci.tenancyOcid,
    }),
  }
}
