export type LookupErrorKind =
  | 'InvalidInputFormat'
  | 'InvalidVin'
  | 'UnknownEngineCode'
  | 'DecodeServiceUnavailable'
  | 'DecodeServiceEmpty';

export interface LookupError {
  kind: LookupErrorKind;
  /** The input as the user typed it (trimmed). */
  input: string;
}

export interface LookupErrorMessage {
  error: string;
  suggestion: string;
}

export function describeLookupError(
  { kind, input }: LookupError,
  knownEngineCodes: readonly string[],
): LookupErrorMessage {
  const codes = knownEngineCodes.join(', ');
  switch (kind) {
    case 'InvalidInputFormat':
      return {
        error: `Engine code not found: ${input}`,
        suggestion: `Enter a 17-character VIN or an engine code such as ${codes}`,
      };
    case 'UnknownEngineCode':
      return {
        error: `Engine code not found: ${input}`,
        suggestion: `Try: ${codes}`,
      };
    case 'InvalidVin':
      return {
        error: `Invalid VIN format: ${input}`,
        suggestion: 'Ensure VIN is exactly 17 characters and does not contain I, O or Q',
      };
    case 'DecodeServiceUnavailable':
      return {
        error: 'VIN decode service unavailable',
        suggestion: 'Try again later or search by engine code',
      };
    case 'DecodeServiceEmpty':
      return {
        error: `Could not decode VIN: ${input}`,
        suggestion: 'Ensure VIN is exactly 17 characters',
      };
  }
}
