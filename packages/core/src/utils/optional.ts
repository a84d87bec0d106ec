/**
 * Fluent builder for objects whose optional properties must be absent rather
 * than `undefined` (e.g. option bags passed on to constructors that spread
 * them over defaults).
 */
export interface OptionalBuilder<T extends object> {
  /**
   * Add a property if its value is defined (not undefined).
   */
  ifDefined<K extends keyof T>(key: K, value: T[K] | undefined): OptionalBuilder<T>;

  build(): T;
}

/**
 * @example
 * ```typescript
 * const options = setOptional<ReconnectionManagerOptions>({ resume, policy })
 *   .ifDefined('random', deps.random)
 *   .ifDefined('sleep', deps.sleep)
 *   .build();
 * ```
 */
export function setOptional<T extends object>(base: T): OptionalBuilder<T> {
  let result = { ...base };

  const builder: OptionalBuilder<T> = {
    ifDefined(key, value) {
      if (value !== undefined) {
        result = { ...result, [key]: value };
      }
      return builder;
    },

    build() {
      return result;
    }
  };

  return builder;
}
