/**
 * Entry point reference parsing
 */

import type { EntryPointRef } from './types.js';
import { LaunchError } from './errors.js';

const DOTTED_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*$/;

/**
 * Parse `<module>:<attribute>`. Both sides are dotted identifier paths.
 *
 * Only the shape is checked here; whether the object exists is up to the runner.
 */
export function parseEntryPoint(ref: string): EntryPointRef {
  const trimmed = ref.trim();
  const separator = trimmed.indexOf(':');

  if (separator === -1) {
    throw new LaunchError(`Entry point "${ref}" must be in the form <module>:<attribute>`, {
      details: { entryPoint: ref },
    });
  }

  const module = trimmed.slice(0, separator);
  const attribute = trimmed.slice(separator + 1);

  if (!DOTTED_IDENTIFIER.test(module)) {
    throw new LaunchError(`Entry point "${ref}" has an invalid module path "${module}"`, {
      details: { entryPoint: ref },
    });
  }
  if (!DOTTED_IDENTIFIER.test(attribute)) {
    throw new LaunchError(`Entry point "${ref}" has an invalid attribute "${attribute}"`, {
      details: { entryPoint: ref },
    });
  }

  return Object.freeze({ module, attribute, ref: `${module}:${attribute}` });
}
