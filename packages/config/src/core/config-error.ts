import { BaseError } from "@mailstop/errors"

export type ConfigIssue = Readonly<{
  path: string
  message: string
}>

/**
 * Startup configuration could not be validated. Never operational: the
 * process should not start with it.
 */
export class ConfigError extends BaseError<"config_invalid"> {
  readonly issues: readonly ConfigIssue[]

  constructor(message: string, issues: readonly ConfigIssue[] = [], cause?: unknown) {
    super(message, {
      code: "config_invalid",
      context: { issues },
      cause,
      isOperational: false,
    })

    this.issues = issues
  }
}
