import type { Logger } from "@mailstop/logger"
import { SuppressionError, type SuppressionOperation } from "../model/suppression.errors"
import type {
  CheckSuppressionResult,
  RemoveSuppressionResult,
  Suppression,
  SuppressionProvider,
} from "../model/suppression.model"

export type SuppressionServiceDeps = {
  provider: SuppressionProvider
  logger: Logger
}

export class SuppressionService {
  private readonly logger: Logger

  constructor(private readonly deps: SuppressionServiceDeps) {
    this.logger = deps.logger.child({ logger: "suppressions" })
  }

  async check(email: string): Promise<CheckSuppressionResult> {
    const found = await this.find(email, "check")

    this.logger.debug("Checked suppression", { email, is_suppressed: found !== undefined })

    return {
      email,
      is_suppressed: found !== undefined,
      suppression: found
        ? { id: found.id, reason: found.reason, time_created: found.timeCreated.toISOString() }
        : null,
    }
  }

  /** @throws {SuppressionError} `suppression_not_found` when `email` is not suppressed */
  async remove(email: string): Promise<RemoveSuppressionResult> {
    const found = await this.find(email, "check")

    if (!found) throw SuppressionError.notFound(email)

    await this.call("remove", email, () => this.deps.provider.delete(found.id))

    this.logger.info("Suppression removed", { email, suppression_id: found.id })

    return {
      message: `Email '${email}' has been successfully removed from the suppression list`,
      email,
      removed: true,
      suppression_id: found.id,
      previous_reason: found.reason,
      previous_time_created: found.timeCreated.toISOString(),
    }
  }

  private async find(email: string, operation: SuppressionOperation): Promise<Suppression | undefined> {
    const entries = await this.call(operation, email, () => this.deps.provider.list(email))

    return entries[0]
  }

  private async call<T>(operation: SuppressionOperation, email: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw SuppressionError.providerFailed({ operation, email, cause: err, ...providerDetails(err) })
    }
  }
}

function providerDetails(err: unknown): { status?: number; serviceCode?: string } {
  if (typeof err !== "object" || err === null) return {}

  return {
    ...("statusCode" in err && typeof err.statusCode === "number" && { status: err.statusCode }),
    ...("serviceCode" in err &&
      typeof err.serviceCode === "string" && { serviceCode: err.serviceCode }),
  }
}
