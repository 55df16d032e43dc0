/**
 * True when a partial update sets at least one field. `null` counts as a change.
 */
export function hasChanges(patch: object): boolean {
  return Object.values(patch).some((value) => value !== undefined);
}

/**
 * Copy only the keys that are present, so `undefined` never reaches the store.
 */
export function definedOnly<T extends object>(patch: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(patch)) {
    if (isKeyOf(patch, key) && patch[key] !== undefined) {
      result[key] = patch[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}
