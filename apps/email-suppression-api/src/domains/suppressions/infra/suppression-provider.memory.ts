import type { Suppression, SuppressionProvider } from "../model/suppression.model"

export type SeedSuppression = {
  emailAddress: string
  reason?: string
  timeCreated?: Date
}

/** In-process suppression list for local runs and tests. */
export class MemorySuppressionProvider implements SuppressionProvider {
  readonly name = "memory"

  private readonly entries = new Map<string, Suppression>()
  private seq = 0

  constructor(private readonly now: () => Date = () => new Date()) {}

  add(seed: SeedSuppression): Suppression {
    this.seq += 1

    const entry: Suppression = {
      id: `suppression-${this.seq}`,
      emailAddress: seed.emailAddress.toLowerCase(),
      reason: seed.reason ?? "MANUAL",
      timeCreated: seed.timeCreated ?? this.now(),
    }

    this.entries.set(entry.id, entry)

    return entry
  }

  async list(email: string): Promise<Suppression[]> {
    const wanted = email.toLowerCase()

    return [...this.entries.values()].filter((e) => e.emailAddress === wanted)
  }

  async delete(id: string): Promise<void> {
    if (!this.entries.delete(id)) throw new Error(`Suppression ${id} not found`)
  }
}
