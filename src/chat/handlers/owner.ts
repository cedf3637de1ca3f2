export const DEFAULT_OWNER = 'default';

/** Email, then display name, then the shared default owner. */
export function resolveOwner(sender: { name?: string; email?: string } | undefined): string {
  const email = sender?.email?.trim();
  if (email) return email;

  const name = sender?.name?.trim();
  if (name) return name;

  return DEFAULT_OWNER;
}
