// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type ExternalId = Brand<string, "ExternalId">;

export const asExternalId = (s: string): ExternalId => s as ExternalId;
