/** A record that could not be written is reported on stderr and dropped. */
export function reportWriteFailure(err: unknown): void {
  const reason = err instanceof Error ? err.message : String(err)

  process.stderr.write(`Failed to write log record: ${reason}\n`)
}
