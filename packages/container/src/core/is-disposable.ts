export type DisposableService = {
  dispose(): void | Promise<void>
}

/**
 * Structural check: anything with a callable `dispose` is disposed by the
 * provider that built it.
 */
export function isDisposable(value: unknown): value is DisposableService {
  return (
    typeof value === "object" &&
    value !== null &&
    "dispose" in value &&
    typeof value.dispose === "function"
  )
}
