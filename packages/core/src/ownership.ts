export interface Owned {
  userId: number;
}

export interface Owner {
  id: number;
}

export function belongsTo(resource: Owned, owner: Owner): boolean {
  return resource.userId === owner.id;
}

/**
 * Return the resource if the owner holds it. Absence and foreign ownership
 * both throw the error from `onMissing`, so callers cannot tell them apart.
 */
export function requireOwned<T extends Owned>(
  resource: T | null | undefined,
  owner: Owner,
  onMissing: () => Error
): T {
  if (!resource || !belongsTo(resource, owner)) {
    throw onMissing();
  }
  return resource;
}
