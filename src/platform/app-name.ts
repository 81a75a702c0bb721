const BASE_MAX_LENGTH = 20;

/**
 * Heroku app names: lowercase letters, digits and dashes, starting with a
 * letter, at most 30 characters. The random suffix keeps them unique.
 */
export function deriveAppName(repoName: string, suffix: string): string {
  let base = repoName
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, "")
    .slice(0, BASE_MAX_LENGTH)
    .replace(/^-+|-+$/g, "");

  if (!base) {
    base = "app";
  } else if (!/^[a-z]/.test(base)) {
    base = `app-${base}`.slice(0, BASE_MAX_LENGTH).replace(/-+$/g, "");
  }

  return `${base}-${suffix}`;
}

export function defaultAppUrl(appName: string): string {
  return `https://${appName}.herokuapp.com`;
}
