/** One suppression list entry as the provider reports it. */
export type Suppression = {
  id: string
  emailAddress: string
  reason: string
  timeCreated: Date
}

export type SuppressionDetail = {
  id: string
  reason: string
  time_created: string
}

export type CheckSuppressionResult = {
  email: string
  is_suppressed: boolean
  suppression: SuppressionDetail | null
}

export type RemoveSuppressionResult = {
  message: string
  email: string
  removed: true
  suppression_id: string
  previous_reason: string
  previous_time_created: string
}

/**
 * Suppression list backend. Failures are thrown as they come; a numeric
 * `statusCode` and a string `serviceCode` on the error are reported when set.
 */
export interface SuppressionProvider {
  readonly name: string
  /** Entries for `email` in the configured compartment. */
  list(email: string): Promise<Suppression[]>
  delete(id: string): Promise<void>
}
