import { ProtocolViolationError } from "./errors.js";

// [<kind>+]file://<host><path>[?query][#fragment]
const packageIdPattern = /^(?:[a-z][a-z0-9-]*\+)?file:\/\/([^/?#]*)([^?#]*)/i;

/**
 * Turns a `cargo pkgid` output such as
 * `path+file:///home/me/src/kernel#obkrnl@0.1.0` into the package's source
 * directory. Nothing is fetched, the id is only taken apart.
 */
export function resolvePackagePath(
  id: string,
  platform: string = process.platform,
): string {
  const match = packageIdPattern.exec(id.trim());
  if (!match) {
    throw new ProtocolViolationError(`Unrecognized package id: ${id}`);
  }

  const [, host, rawPath] = match;
  let path: string;

  try {
    path = decodeURIComponent(host + rawPath);
  } catch (error) {
    throw new ProtocolViolationError(`Malformed package id: ${id}`, {
      cause: error,
    });
  }

  // Remove '/' in front of drive letter.
  if (platform === "win32" && /^\/[A-Za-z]:/.test(path)) {
    path = path.slice(1);
  }

  if (path === "") {
    throw new ProtocolViolationError(`Package id has no path: ${id}`);
  }

  return path;
}
