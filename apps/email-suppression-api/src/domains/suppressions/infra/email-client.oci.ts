import * as common from "oci-common"
import { EmailClient } from "oci-emaildelivery"
import type { OciConfig } from "../../../app/config"

/**
 * Email Delivery client for the configured region. Instance principals need
 * the instance metadata service, so this only works on OCI compute.
 */
export async function createOciEmailClient(config: OciConfig): Promise<EmailClient> {
  const authenticationDetailsProvider =
    config.auth === "config_file"
      ? new common.ConfigFileAuthenticationDetailsProvider(config.configFile, config.profile)
      : await new common.InstancePrincipalsAuthenticationDetailsProviderBuilder().build()

  const client = new EmailClient({ authenticationDetailsProvider })
  client.regionId = config.region

  return client
}
