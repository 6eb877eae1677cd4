/**
 * @file config.ts
 * @description Resolves a PolicyConfig from user settings and the default tables
 */

import {readFileSync} from 'fs'
import {z} from 'zod'
import {
  CSP_HEADER,
  CSP_REPORT_ONLY_HEADER,
  DEFAULT_DIRECTIVES,
  DEFAULT_NONCE_DIRECTIVES,
} from './constants.js'
import {isTokenList} from './policy-builder.js'
import type {
  DirectiveMap,
  DirectiveValue,
  PolicyConfig,
  PolicySettings,
} from './types.js'

export const DEFAULT_CONFIG: Required<Omit<PolicyConfig, 'directives'>> =
  Object.freeze({
    includeNonceIn: DEFAULT_NONCE_DIRECTIVES,
    reportOnly: false,
    reportPercentage: 0, // integer between 0 and 100
  })

function copyValue(
  value: DirectiveValue | null | undefined,
): DirectiveValue | null {
  if (value == null) return null
  return isTokenList(value) ? Object.freeze([...value]) : value
}

/**
 * Overlays user settings onto the defaults. Known directives keep the
 * default table's order; directives only the user names follow in their
 * own order. The result is frozen and shares no arrays with `settings`.
 */
export function fromSettings(settings: PolicySettings = {}): PolicyConfig {
  const userDirectives: DirectiveMap = settings.directives ?? {}
  const directives: Record<string, DirectiveValue | null> = {}

  for (const [name, value] of Object.entries(DEFAULT_DIRECTIVES)) {
    directives[name] = Object.hasOwn(userDirectives, name)
      ? copyValue(userDirectives[name])
      : value
  }
  for (const [name, value] of Object.entries(userDirectives)) {
    if (!Object.hasOwn(directives, name)) {
      directives[name] = copyValue(value)
    }
  }

  return Object.freeze({
    directives: Object.freeze(directives),
    includeNonceIn: Object.freeze([
      ...(settings.includeNonceIn ?? DEFAULT_CONFIG.includeNonceIn),
    ]),
    reportOnly: settings.reportOnly ?? DEFAULT_CONFIG.reportOnly,
    reportPercentage:
      settings.reportPercentage ?? DEFAULT_CONFIG.reportPercentage,
  })
}

const SETTINGS_PERCENTAGE_ERROR = 'must be an integer between 0 and 100'

// JSON cannot carry URL objects, so file tokens are plain scalars
const tokenSchema = z.union([z.string(), z.number(), z.boolean()])

/**
 * Shape of a JSON settings file. Unknown top-level keys are dropped.
 */
export const settingsSchema = z.object(
  {
    directives: z
      .record(
        z.union([tokenSchema, z.array(tokenSchema), z.null()], {
          errorMap: () => ({
            message: 'must be a token, a list of tokens or null',
          }),
        }),
        {invalid_type_error: 'must be an object'},
      )
      .optional(),
    includeNonceIn: z
      .array(z.string({invalid_type_error: 'must be a directive name'}), {
        invalid_type_error: 'must be a list of directive names',
      })
      .optional(),
    reportOnly: z
      .boolean({invalid_type_error: 'must be a boolean'})
      .optional(),
    reportPercentage: z
      .number({invalid_type_error: SETTINGS_PERCENTAGE_ERROR})
      .int(SETTINGS_PERCENTAGE_ERROR)
      .min(0, SETTINGS_PERCENTAGE_ERROR)
      .max(100, SETTINGS_PERCENTAGE_ERROR)
      .optional(),
  },
  {invalid_type_error: 'Settings must be a JSON object'},
)

/**
 * Validates settings read from JSON.
 * @throws Error carrying the path and message of the first issue, e.g.
 *   `reportOnly: must be a boolean`
 */
export function parseSettings(raw: unknown): PolicySettings {
  const result = settingsSchema.safeParse(raw)
  if (!result.success) {
    const firstError = result.error.issues[0]
    if (!firstError) throw new Error('Invalid settings')
    const path = firstError.path.join('.')
    throw new Error(
      path ? `${path}: ${firstError.message}` : firstError.message,
    )
  }
  return result.data
}

/**
 * Reads and validates a JSON settings file.
 */
export function loadSettingsFile(path: string): PolicySettings {
  const text = readFileSync(path, 'utf8')
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new Error(`Invalid settings file ${path}: ${reason}`)
  }
  return parseSettings(raw)
}

/**
 * Name of the header the policy is sent under.
 */
export function headerName(config: Pick<PolicyConfig, 'reportOnly'>): string {
  return config.reportOnly ? CSP_REPORT_ONLY_HEADER : CSP_HEADER
}

/**
 * Samples whether reporting applies to this request, given reportPercentage.
 */
export function shouldReport(
  config: Pick<PolicyConfig, 'reportPercentage'>,
  random: () => number = Math.random,
): boolean {
  return random() * 100 < config.reportPercentage
}
