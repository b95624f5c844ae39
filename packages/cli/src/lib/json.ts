export function parseJson(value: string, onError: (message: string) => Error): unknown {
  try {
    return JSON.parse(value)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw onError(message)
  }
}
