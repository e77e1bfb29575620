/**
 * Case conversion for config and state files (snake_case) ↔ TypeScript (camelCase)
 *
 * Configuration keys keep their historical snake_case names (`global_zone_host`,
 * `zone_template`, ...) and state files are written the same way.
 */

import type { CamelCasedPropertiesDeep, SnakeCasedPropertiesDeep } from 'type-fest'

/**
 * Convert a string from snake_case to camelCase
 */
export function snakeToCamel(str: string): string {
  return str.replace(/_([a-z])/g, (_, char: string) => char.toUpperCase())
}

/**
 * Convert a string from camelCase to snake_case
 */
export function camelToSnake(str: string): string {
  return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`)
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false
  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function convertKeysDeep(value: unknown, convert: (key: string) => string): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => convertKeysDeep(item, convert))
  }
  // Dates, buffers and class instances pass through untouched
  if (!isPlainObject(value)) {
    return value
  }
  const result: Record<string, unknown> = {}
  for (const [key, inner] of Object.entries(value)) {
    result[convert(key)] = convertKeysDeep(inner, convert)
  }
  return result
}

/**
 * Recursively convert object keys from snake_case to camelCase
 */
export function snakeToCamelDeep<T>(obj: T): CamelCasedPropertiesDeep<T> {
  return convertKeysDeep(obj, snakeToCamel) as CamelCasedPropertiesDeep<T>
}

/**
 * Recursively convert object keys from camelCase to snake_case
 */
export function camelToSnakeDeep<T>(obj: T): SnakeCasedPropertiesDeep<T> {
  return convertKeysDeep(obj, camelToSnake) as SnakeCasedPropertiesDeep<T>
}

export type { CamelCasedPropertiesDeep, SnakeCasedPropertiesDeep }
