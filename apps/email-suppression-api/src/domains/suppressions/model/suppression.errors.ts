import { BaseError } from "@mailstop/errors"

export type SuppressionErrorCode = "suppression_not_found" | "provider_error"

export type SuppressionOperation = "check" | "remove"

export class SuppressionError extends BaseError<SuppressionErrorCode> {
  static notFound(email: string): SuppressionError {
    return new SuppressionError(`Email '${email}' is not in the suppression list`, {
      code: "suppression_not_found",
      context: { email },
    })
  }

  /**
   * Wraps a provider failure; the provider's status and service code travel
   * in the context.
   */
  static providerFailed(input: {
    operation: SuppressionOperation
    email: string
    cause: unknown
    status?: number
    serviceCode?: string
  }): SuppressionError {
    const reason = input.cause instanceof Error ? input.cause.message : String(input.cause)

    return new SuppressionError(
      `Failed to ${input.operation} suppression for ${input.email}: ${reason}`,
      {
        code: "provider_error",
        context: {
          email: input.email,
          operation: input.operation,
          ...(input.status !== undefined && { providerStatus: input.status }),
          ...(input.serviceCode !== undefined && { serviceCode: input.serviceCode }),
        },
        cause: input.cause,
      },
    )
  }
}
