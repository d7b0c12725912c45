/**
 * Default TypeScript types for well-known custom scalars.
 * Builtin scalars are fixed and not configurable.
 */
export const DEFAULT_SCALARS: Record<string, string> = {
  DateTime: "string",
  Date: "string",
  Time: "string",
  JSON: "unknown",
  JSONObject: "Record<string, unknown>",
  BigInt: "string",
  UUID: "string",
  URL: "string",
};

/** Type used for a custom scalar with no mapping */
export const UNMAPPED_SCALAR_TYPE = "unknown";

/**
 * Merge user-defined scalars with defaults
 */
export function resolveScalars(
  userScalars?: Record<string, string>,
): Record<string, string> {
  return {
    ...DEFAULT_SCALARS,
    ...userScalars,
  };
}
