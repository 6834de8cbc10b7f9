/** Leaves a header the handler already set untouched. */
export function setHeaderIfMissing(headers: Headers, name: string, value: string): void {
  if (!headers.has(name)) headers.set(name, value)
}
