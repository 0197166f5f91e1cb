/**
 * Reads an environment variable, returning `undefined` outside of Node.js or
 * when the variable is unset or empty.
 */
export function getEnv(name: string): string | undefined {
  if (typeof process === "undefined") return undefined;
  const value = process.env[name];
  return value === undefined || value === "" ? undefined : value;
}
