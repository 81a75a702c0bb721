import { randomUUID } from "node:crypto";

/** Eight lowercase hex characters. */
export function shortHexId(): string {
  return randomUUID().replace(/-/g, "").slice(0, 8);
}

/** Coerces free text into a name GitHub accepts for a repository. */
export function slugifyRepoName(value: string, maxLength = 90): string {
  const slug = value
    .trim()
    .replace(/[^A-Za-z0-9._-]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^[-.]+|[-.]+$/g, "")
    .slice(0, maxLength)
    .replace(/[-.]+$/g, "");

  return slug || "generated-app";
}

/** Single-line text for a repository description, cut by code point. */
export function toDescription(value: string, maxLength = 200): string {
  return Array.from(value.replace(/\s+/g, " ").trim()).slice(0, maxLength).join("").trim();
}
