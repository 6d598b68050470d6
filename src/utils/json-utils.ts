/**
 * json-utils.ts
 * JSON parse/stringify that return a value instead of throwing
 */

/**
 * Safely parses a JSON string, returning the fallback when the input is not valid JSON.
 */
export const safeJsonParse = (jsonString: string, fallback: unknown = null): unknown => {
  try {
    return JSON.parse(jsonString);
  } catch {
    return fallback;
  }
};

/**
 * Converts a value to a JSON string; returns undefined when the value cannot be serialized
 * (circular structures, BigInt).
 */
export const safeJsonStringify = (value: unknown, space?: number): string | undefined => {
  try {
    return JSON.stringify(value, null, space);
  } catch {
    return undefined;
  }
};
