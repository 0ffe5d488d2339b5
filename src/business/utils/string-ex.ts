// SPDX-License-Identifier: Apache-2.0

export class StringEx {
  public static readonly EMPTY: string = '';
  public static readonly UNDERSCORE: string = '_';
  public static readonly PERIOD: string = '.';
  public static readonly COMMA: string = ',';

  private constructor() {}

  public static isEmpty(value: string | undefined | null): boolean {
    return !value || value.trim().length === 0;
  }

  /**
   * Converts `listTimeoutSeconds` into `list_timeout_seconds`. Runs of capitals are kept together, so `apiURL`
   * becomes `api_url`.
   */
  public static camelCaseToSnake(value: string): string {
    if (StringEx.isEmpty(value)) {
      return value;
    }

    return value
      .replaceAll(/([a-z\d])([A-Z])/g, '$1_$2')
      .replaceAll(/([A-Z]+)([A-Z][a-z\d]+)/g, '$1_$2')
      .toLowerCase();
  }

  /**
   * Splits a comma delimited list, trimming every item and dropping the empty ones.
   */
  public static splitList(value: string | undefined | null): string[] {
    if (value === undefined || value === null || StringEx.isEmpty(value)) {
      return [];
    }

    return value
      .split(StringEx.COMMA)
      .map((item: string): string => item.trim())
      .filter((item: string): boolean => item.length > 0);
  }
}
