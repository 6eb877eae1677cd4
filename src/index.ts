/**
 * @file index.ts
 * @description Public entry point: policy builder, script tag renderer and settings helpers
 */

export {buildPolicy, PolicyBuilder, toTokens} from './policy-builder.js'
export {renderScriptTag, unwrapScript} from './script-tag.js'
export {
  DEFAULT_CONFIG,
  fromSettings,
  headerName,
  loadSettingsFile,
  parseSettings,
  settingsSchema,
  shouldReport,
} from './config.js'
export {generateNonce} from './nonce.js'
export {
  CSP_HEADER,
  CSP_REPORT_ONLY_HEADER,
  DEFAULT_DIRECTIVES,
  KNOWN_DIRECTIVES,
  SCRIPT_ATTRS,
} from './constants.js'
export type * from './types.js'
