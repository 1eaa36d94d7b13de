/**
 * Narrow a provider state value to a known name.
 * The gax clients decode proto enums as their string names; anything else
 * (an unrecognised name, a raw number, a missing field) maps to the fallback.
 */
export function toKnownState<T extends string>(
  value: unknown,
  known: readonly T[],
  fallback: T
): T {
  if (typeof value !== "string") {
    return fallback;
  }
  const match = known.find((state) => state === value);
  return match ?? fallback;
}
