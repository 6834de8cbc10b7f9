import type { Suppression, SuppressionProvider } from "../model/suppression.model"

type OciSuppressionSummary = {
  id: string
  emailAddress: string
  reason?: string
  timeCreated?: Date | string
}

/** The part of `EmailClient` from `oci-emaildelivery` this adapter calls. */
export interface OciSuppressionClient {
  listSuppressions(request: {
    compartmentId: string
    emailAddress?: string
  }): Promise<{ items: OciSuppressionSummary[] }>
  deleteSuppression(request: { suppressionId: string }): Promise<unknown>
}

export type OciSuppressionProviderOptions = {
  /** Suppressions live in the tenancy's root compartment. */
  compartmentId: string
}

export class OciSuppressionProvider implements SuppressionProvider {
  readonly name = "oci"

  constructor(
    private readonly client: OciSuppressionClient,
    private readonly opts: OciSuppressionProviderOptions,
  ) {}

  async list(email: string): Promise<Suppression[]> {
    const res = await this.client.listSuppressions({
      compartmentId: this.opts.compartmentId,
      emailAddress: email,
    })

    return res.items.map(toSuppression)
  }

  async delete(id: string): Promise<void> {
    await this.client.deleteSuppression({ suppressionId: id })
  }
}

function toSuppression(item: OciSuppressionSummary): Suppression {
  return {
    id: item.id,
    emailAddress: item.emailAddress,
    reason: item.reason ?? "UNKNOWN",
    timeCreated:
      item.timeCreated instanceof Date ? item.timeCreated : new Date(item.timeCreated ?? 0),
  }
}
