/**
 * Join a group prefix and a route path.
 *
 * A root prefix (`/` or empty) leaves the path exactly as registered.
 */
export function joinPath(prefix: string, path: string): string {
  if (prefix === "" || prefix === "/") {
    return path;
  }
  const normalizedBase = prefix.endsWith("/") ? prefix.slice(0, -1) : prefix;
  const normalizedPrefix = normalizedBase.startsWith("/")
    ? normalizedBase
    : `/${normalizedBase}`;
  const normalizedPath = path.startsWith("/") ? path : `/${path}`;
  return `${normalizedPrefix}${normalizedPath}`;
}
