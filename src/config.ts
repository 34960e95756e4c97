/**
 * Engine configuration from environment variables.
 *
 * FIELDGATE_REPORT_HIDDEN_VALUES=true|false|1|0 (default: true)
 * FIELDGATE_EXPRESSION_PREFIX=<prefix> (optional, e.g. "=")
 *
 * Empty values count as unset.
 */

import { z } from 'zod';
import { EngineConfigError } from './core/errors';
import type { ValidatorConfig } from './core/validator';

export type EngineConfig = ValidatorConfig;

export type EngineEnv = Readonly<Record<string, string | undefined>>;

const BooleanFlagSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  FIELDGATE_REPORT_HIDDEN_VALUES: z.preprocess(unsetValue, BooleanFlagSchema.optional()),
  FIELDGATE_EXPRESSION_PREFIX: z.preprocess(unsetValue, z.string().optional()),
});

function unsetValue(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

/**
 * Read EngineConfig from the environment.
 *
 * @throws EngineConfigError when a variable holds an unsupported value
 */
export function loadEngineConfig(env: EngineEnv = process.env): EngineConfig {
  const result = EnvSchema.safeParse({
    FIELDGATE_REPORT_HIDDEN_VALUES: env.FIELDGATE_REPORT_HIDDEN_VALUES,
    FIELDGATE_EXPRESSION_PREFIX: env.FIELDGATE_EXPRESSION_PREFIX,
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = issue ? String(issue.path[0]) : undefined;
    throw new EngineConfigError(
      `Invalid value for ${variable ?? 'engine configuration'}: ${String(
        variable ? env[variable] : ''
      )}. Valid values: true, false, 1, 0`,
      variable
    );
  }

  const config: EngineConfig = {};
  if (result.data.FIELDGATE_REPORT_HIDDEN_VALUES !== undefined) {
    config.reportHiddenValues = result.data.FIELDGATE_REPORT_HIDDEN_VALUES;
  }
  if (result.data.FIELDGATE_EXPRESSION_PREFIX !== undefined) {
    config.expressionPrefix = result.data.FIELDGATE_EXPRESSION_PREFIX;
  }
  return config;
}
