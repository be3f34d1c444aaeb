/**
 * Name-case transforms used for template substitution.
 *
 * Module names are lower-kebab-case (`user-management`); the transforms
 * below are total over that shape and also accept TitleCase entity names.
 */

/**
 * `user-management` -> `UserManagement`.
 * Each hyphen (or underscore/space) segment gets its first letter uppercased.
 */
export function toTitleCase(name: string): string {
  return name
    .split(/[-_\s]+/)
    .filter((segment) => segment.length > 0)
    .map((segment) => segment.charAt(0).toUpperCase() + segment.slice(1))
    .join('');
}

/**
 * `user-management` -> `USER_MANAGEMENT`.
 */
export function toUpperCase(name: string): string {
  return name.replace(/-/g, '_').toUpperCase();
}

/**
 * `user-management` -> `user_management`.
 */
export function toSnakeCase(name: string): string {
  return name.replace(/-/g, '_').toLowerCase();
}

/**
 * `user_management` -> `user-management`.
 */
export function toKebabCase(name: string): string {
  return name.replace(/[_\s]+/g, '-').toLowerCase();
}
