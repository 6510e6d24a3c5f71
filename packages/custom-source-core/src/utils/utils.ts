import { isRecord } from "./type-guards.js";

export function deepCopy<T>(item: T): T {
  if (Array.isArray(item)) {
    return item.map((element: unknown) => deepCopy(element)) as T;
  } else if (isRecord(item)) {
    const copy: Record<string, unknown> = {};
    for (const key of Object.keys(item)) {
      copy[key] = deepCopy(item[key]);
    }
    return copy as T;
  } else {
    return item;
  }
}

/**
 * Merges the defined properties of `config` over a copy of `defaultConfig`.
 * Properties left `undefined` keep their default; properties unknown to
 * `defaultConfig` are dropped.
 */
export function mergeConfig<T extends object>(
  defaultConfig: T,
  config: Partial<T> = {},
): T {
  const mergedConfig = deepCopy(defaultConfig);

  const keysOfT = Object.keys(defaultConfig) as (keyof T)[];
  keysOfT.forEach((key) => {
    const value: T[keyof T] | undefined = config[key];
    if (value !== undefined) {
      mergedConfig[key] = deepCopy(value);
    }
  });

  return mergedConfig;
}
