/**
 * camelCase <-> snake_case conversion for field names.
 */

export function toSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z])([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();
}

export function toCamelCase(name: string): string {
  return name.replace(/_([a-z0-9])/g, (_match, char: string) =>
    char.toUpperCase()
  );
}
