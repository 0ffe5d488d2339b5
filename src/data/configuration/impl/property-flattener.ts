// SPDX-License-Identifier: Apache-2.0

export class PropertyFlattener {
  private constructor() {}

  /**
   * Turns a nested plain object into dotted keys. Arrays are kept whole as JSON, `undefined` and `null` are
   * skipped.
   */
  public static flatten(value: object, prefix: string = ''): Map<string, string> {
    const result: Map<string, string> = new Map<string, string>();
    PropertyFlattener.collect(value, prefix, result);
    return result;
  }

  private static collect(value: object, prefix: string, result: Map<string, string>): void {
    const entries: [string, unknown][] = Object.entries(value);
    for (const [key, child] of entries) {
      const path: string = prefix.length > 0 ? `${prefix}.${key}` : key;
      if (child === undefined || child === null) {
        continue;
      }
      if (Array.isArray(child)) {
        result.set(path, JSON.stringify(child));
      } else if (typeof child === 'object') {
        PropertyFlattener.collect(child, path, result);
      } else {
        result.set(path, String(child));
      }
    }
  }
}
