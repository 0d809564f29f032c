export function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

export function isStringRecord(input: unknown): input is Record<string, string> {
  return isRecord(input) && Object.values(input).every((value) => typeof value === 'string');
}

export function isStringArray(input: unknown): input is string[] {
  return Array.isArray(input) && input.every((entry) => typeof entry === 'string');
}
