// Searched in this order; the first pattern that matches anywhere in the
// input wins, so a stamped engine number like "D16W73005025" yields "D16W7".
const ENGINE_CODE_PATTERNS: readonly RegExp[] = [
  // Honda
  /D\d{2}[A-Z]\d?/, // D16W7, D17A1
  /B\d{2}[A-Z]\d?/, // B18C1, B16A2
  /H\d{2}[A-Z]\d?/, // H22A1
  /F\d{2}[A-Z]\d?/, // F22B1, F20B
  /K\d{2}[A-Z]\d?/, // K20A2, K24A2
  // Toyota
  /\d[A-Z]{2}-[A-Z]{2}/, // 1ZZ-FE, 2AZ-FE
  /\d[A-Z]{2}FE/, // 1ZZFE
];

export function normalizeEngineInput(input: string): string {
  return input.trim().toUpperCase();
}

/**
 * Pulls a manufacturer engine code out of free-form input. Falls back to an
 * exact match against the known engine codes when no pattern applies.
 */
export function extractEngineCode(input: string, knownCodes: Iterable<string>): string | null {
  const candidate = normalizeEngineInput(input);
  if (!candidate) return null;

  for (const pattern of ENGINE_CODE_PATTERNS) {
    const match = pattern.exec(candidate);
    if (match) return match[0];
  }

  for (const code of knownCodes) {
    if (code === candidate) return candidate;
  }
  return null;
}
