/**
 * Normalizes a content path: backslashes become `/`, and empty, `.` and `..`
 * components are dropped, so the result never escapes the version root.
 */
export function cleanPath(path: string): string {
  return path
    .replace(/\\/g, "/")
    .split("/")
    .filter(component => component !== "" && component !== "." && component !== "..")
    .join("/");
}

export function basename(path: string): string {
  const components = path.split("/");
  return components[components.length - 1] ?? "";
}
