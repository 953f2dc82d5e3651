/**
 * Returns true if the error is a MODULE_NOT_FOUND for the expected package.
 * Other errors (syntax errors, permission issues, broken transitive deps)
 * should propagate so they're visible during startup.
 */
export function isModuleNotFound(error: unknown, packageName: string): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "MODULE_NOT_FOUND" &&
    error.message.includes(packageName)
  );
}
