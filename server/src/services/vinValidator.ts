const VIN_LENGTH = 17;
const EXCLUDED_CHARACTERS = /[IOQ]/;
const VIN_PATTERN = /^[A-HJ-NPR-Z0-9]{17}$/;

/**
 * Structural VIN check: 17 characters from the VIN alphabet, which leaves out
 * I, O and Q. The check digit in position 9 is accepted as any allowed
 * character; no checksum is computed.
 */
export function isValidVin(candidate: string): boolean {
  if (!candidate || candidate.length !== VIN_LENGTH) return false;
  if (EXCLUDED_CHARACTERS.test(candidate)) return false;
  return VIN_PATTERN.test(candidate);
}

export function looksLikeVin(input: string): boolean {
  return input.trim().length === VIN_LENGTH;
}
