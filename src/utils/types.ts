declare const brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [brand]: B };

/** Opaque per-conversation identifier. Never a display name. */
export type ContactKey = Brand<string, "ContactKey">;

/** Local calendar day, formatted `YYYY-MM-DD`. */
export type DayKey = Brand<string, "DayKey">;

export const ContactKey = {
  make: (value: string): ContactKey => value as ContactKey,
};

export const DayKey = {
  make: (value: string): DayKey => value as DayKey,
};
