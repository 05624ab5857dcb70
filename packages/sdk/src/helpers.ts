import { AUTO_PROVIDER, type UserFacingError } from "@keyrelay/shared";

/**
 * Split "model:provider" on the last colon.
 * Without a provider suffix the router chooses ("auto").
 */
export function parseModelAndProvider(value: string): { model: string; provider: string } {
  const separator = value.lastIndexOf(":");
  if (separator === -1) {
    return { model: value.trim(), provider: AUTO_PROVIDER };
  }
  const model = value.slice(0, separator).trim();
  const provider = value.slice(separator + 1).trim();
  return { model, provider: provider === "" ? AUTO_PROVIDER : provider };
}

export function formatErrorMessage(title: string, description: string): string {
  return `❌ ${title}: ${description}`;
}

export function formatUserFacingError(error: UserFacingError): string {
  return formatErrorMessage(error.title, error.message);
}

/**
 * Whether a signed-in user may use the application.
 * An empty allow-list admits everyone.
 */
export function hasAllowedOrganization(
  userOrgs: readonly string[],
  allowedOrgs: readonly string[],
): boolean {
  if (allowedOrgs.length === 0) return true;
  return userOrgs.some((org) => allowedOrgs.includes(org));
}
