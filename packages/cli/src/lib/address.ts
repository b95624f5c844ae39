const PHONE_LIKE_PATTERN = /^[0-9() +-]*$/
const SIGNIFICANT_DIGITS = 10

/**
 * Reduces a phone number to its last ten digits so that `+1 (555) 010-0001` and
 * `5550100001` compare equal. Addresses that are not phone numbers (e-mail
 * addresses, short codes with letters, contact names) are returned unchanged.
 */
export function normalizeAddress(address: string): string {
  if (!PHONE_LIKE_PATTERN.test(address)) {
    return address
  }

  return address.replace(/\D/g, "").slice(-SIGNIFICANT_DIGITS)
}
