/**
 * Option Providers
 *
 * Some choice fields (Enum, MultiEnum, RadioButtonSet) cannot list their
 * options in the schema file: timezones, countries, rows of another table.
 * Such a field names a provider in `optionsProvider`, and the platform looks
 * the provider up in an explicit registry when metadata is loaded.
 */

/** Stored value → display label */
export type FieldOptions = Record<string, string>;

export type OptionProvider = () => FieldOptions | Promise<FieldOptions>;

/**
 * Helper to declare an option provider with type checking.
 *
 * @example
 * export const weekdays = defineOptionProvider(() => ({ mon: "Monday", tue: "Tuesday" }));
 */
export function defineOptionProvider(provider: OptionProvider): OptionProvider {
  return provider;
}
