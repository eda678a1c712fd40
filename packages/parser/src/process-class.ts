import { getSchema } from './schema.js';

/**
 * Resolve a process class to its name in the ProcessClass enum. Values the
 * schema does not define come back as "unknown enum value N".
 */
export function processClassName(value: number): string {
  return getSchema().processClassNames.get(value) ?? `unknown enum value ${value}`;
}
