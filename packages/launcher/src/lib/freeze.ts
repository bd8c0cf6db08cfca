/** Recursively freeze a value in place and return it */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.getOwnPropertyNames(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}
