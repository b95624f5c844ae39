const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/

export function decodeBase64(value: string): Buffer | undefined {
  const compact = value.replace(/\s+/g, "")
  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    return undefined
  }

  return Buffer.from(compact, "base64")
}

export function encodeBase64(data: Buffer): string {
  return data.toString("base64")
}
