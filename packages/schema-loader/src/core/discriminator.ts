/**
 * Typed discriminator authoring.
 *
 * `activates` must have a key for every value, so forgetting an option is a
 * compile error rather than a load-time NonExhaustiveDiscriminator issue.
 *
 * @example
 * ```typescript
 * const resource = defineDiscriminator('resource', ['message', 'chat'], {
 *   message: ['text', 'chatId'],
 *   chat: ['chatId'],
 * });
 * ```
 */

import type { DiscriminatorDefinition } from '../schemas/unit-definition';

export function defineDiscriminator<const V extends string>(
  path: string,
  values: readonly V[],
  activates: { readonly [K in V]: readonly string[] }
): DiscriminatorDefinition {
  const map: Record<string, string[]> = {};
  for (const value of values) {
    map[value] = [...activates[value]];
  }
  return { path, activates: map };
}
