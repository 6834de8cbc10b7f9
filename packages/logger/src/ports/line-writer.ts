/**
 * Destination for serialized records. Each call receives exactly one
 * newline-terminated line.
 */
export interface LineWriter {
  write(chunk: string): unknown
}
