/**
 * Branded types used across cmdlink.
 */

declare const NonEmptyStringBrand: unique symbol
declare const AliasBrand: unique symbol
declare const AbsolutePathBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

export type NonEmptyString = Brand<string, typeof NonEmptyStringBrand>
export type Alias = Brand<string, typeof AliasBrand>
export type AbsolutePath = Brand<string, typeof AbsolutePathBrand>
