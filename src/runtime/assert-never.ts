/**
 * Exhaustiveness helper for discriminated unions.
 * Put it in the `default` branch of a `switch` over a union: adding a member
 * without handling it becomes a compile error.
 */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
