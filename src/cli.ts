#!/usr/bin/env node

/**
 * @file cli.ts
 * @description Command-line interface for the policy builder and the script tag renderer
 */

import {realpathSync} from 'fs'
import {fileURLToPath} from 'node:url'
import {parseArgs} from 'node:util'
import {fromSettings, headerName, loadSettingsFile} from './config.js'
import {generateNonce} from './nonce.js'
import {PolicyBuilder} from './policy-builder.js'
import {renderScriptTag} from './script-tag.js'
import type {
  CliOptions,
  DirectiveValue,
  Logger,
  OutputFormat,
} from './types.js'

const COMMANDS = ['policy', 'script']
const OUTPUT_FORMATS: readonly OutputFormat[] = ['header', 'raw', 'json']

/**
 * Parses `dir:a,b;dir2:c` into a directive map. A single `true` or
 * `false` value yields a flag directive.
 */
export function parseDirectiveList(
  value: string | undefined,
): Record<string, DirectiveValue> {
  if (!value) return {}
  const directives: Record<string, DirectiveValue> = {}
  value.split(';').forEach((entry) => {
    // URLs carry colons, so only the first one separates the name
    const index = entry.indexOf(':')
    if (index === -1) return
    const directive = entry.slice(0, index).trim()
    const tokens = entry
      .slice(index + 1)
      .split(',')
      .map((v) => v.trim())
      .filter(Boolean)
    if (!directive || !tokens.length) return

    const [first] = tokens
    if (tokens.length === 1 && (first === 'true' || first === 'false')) {
      directives[directive] = first === 'true'
    } else {
      directives[directive] = Object.freeze(tokens)
    }
  })
  return directives
}

export function formatOutput(
  value: string,
  format: OutputFormat,
  header: string,
  nonce?: string,
): string {
  switch (format) {
    case 'json':
      return JSON.stringify(
        nonce ? {[header]: value, nonce} : {[header]: value},
        null,
        2,
      )
    case 'raw':
      return value
    case 'header':
    default:
      return `${header}: ${value}`
  }
}

function isOutputFormat(value: string | undefined): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value)
}

export function getOptions(): CliOptions {
  const {
    values: {
      config,
      update,
      replace,
      nonce,
      'generate-nonce': generateNonceFlag,
      'report-only': reportOnly,
      format,
      verbose,
      content,
      id,
      src,
      type,
      integrity,
      async,
      defer,
      nomodule,
    },
    positionals,
  } = parseArgs({
    options: {
      config: {type: 'string', short: 'c'},
      update: {type: 'string'},
      replace: {type: 'string'},
      nonce: {type: 'string'},
      'generate-nonce': {type: 'string'},
      'report-only': {type: 'string'},
      format: {type: 'string', short: 'f'},
      verbose: {type: 'boolean', short: 'v'},
      content: {type: 'string'},
      id: {type: 'string'},
      src: {type: 'string'},
      type: {type: 'string'},
      integrity: {type: 'string'},
      async: {type: 'string'},
      defer: {type: 'string'},
      nomodule: {type: 'string'},
    },
    allowPositionals: true,
  })

  const parseBoolean = (
    value: string | undefined,
    envVar: string | undefined,
  ) => {
    if (value !== undefined) return value === 'true'
    return envVar === 'true'
  }

  const parseOptionalBoolean = (
    value: string | undefined,
    envVar: string | undefined,
  ) => {
    const val = value ?? envVar
    if (!val) return undefined
    return val === 'true'
  }

  const outputFormat = format || process.env.CSP_OUTPUT_FORMAT

  return {
    command: positionals[0] || 'policy',
    configPath: config || process.env.CSP_CONFIG || undefined,
    update: parseDirectiveList(update || process.env.CSP_UPDATE),
    replace: parseDirectiveList(replace || process.env.CSP_REPLACE),
    nonce: nonce || process.env.CSP_NONCE || undefined,
    generateNonce: parseBoolean(
      generateNonceFlag,
      process.env.CSP_GENERATE_NONCE,
    ),
    reportOnly: parseOptionalBoolean(reportOnly, process.env.CSP_REPORT_ONLY),
    outputFormat: isOutputFormat(outputFormat) ? outputFormat : 'header',
    verbose: verbose ?? process.env.CSP_VERBOSE === 'true',
    script: {
      content,
      attrs: {
        id,
        src,
        type,
        integrity,
        async: parseOptionalBoolean(async, undefined),
        defer: parseOptionalBoolean(defer, undefined),
        nomodule: parseOptionalBoolean(nomodule, undefined),
      },
    },
  }
}

/**
 * Diagnostics go to stderr so stdout carries only the result.
 */
export function createLogger(verbose: boolean): Logger {
  return {
    error: (...args: unknown[]) => console.error(...args),
    warn: (...args: unknown[]) => console.error(...args),
    info: (...args: unknown[]) => console.error(...args),
    debug: (...args: unknown[]) => {
      if (verbose) console.error(...args)
    },
  }
}

/**
 * Produces the command's output for already-resolved options.
 * @throws Error when the settings file cannot be read or is malformed
 */
export function run(options: CliOptions, logger: Logger): string {
  const nonce =
    options.nonce || (options.generateNonce ? generateNonce() : undefined)

  if (options.command === 'script') {
    return renderScriptTag(options.script.content, {
      ...options.script.attrs,
      nonce,
    })
  }

  const settings = options.configPath
    ? loadSettingsFile(options.configPath)
    : {}
  logger.debug(`Loaded settings from ${options.configPath ?? 'defaults'}`)
  const config = fromSettings(
    options.reportOnly === undefined
      ? settings
      : {...settings, reportOnly: options.reportOnly},
  )

  const policy = new PolicyBuilder(config, {logger}).build({
    update: options.update,
    replace: options.replace,
    nonce,
  })
  return formatOutput(policy, options.outputFormat, headerName(config), nonce)
}

function printUsage(): void {
  console.error('Usage: csp-builder [policy|script] [options]')
  console.error('\nOptions:')
  console.error('  --config, -c <path>            JSON settings file')
  console.error(
    '  --update <list>                Tokens appended per directive (dir:a,b;dir2:c)',
  )
  console.error(
    '  --replace <list>               Directive values replacing the settings',
  )
  console.error('  --nonce <value>                Nonce to inject')
  console.error(
    '  --generate-nonce <true|false>  Generate a random nonce',
  )
  console.error(
    '  --report-only <true|false>     Use the Report-Only header name',
  )
  console.error(
    '  --format, -f <format>          Output format (header, raw, json)',
  )
  console.error('  --verbose, -v                  Debug logging to stderr')
  console.error(
    '\nScript options: --content --id --src --type --integrity --async --defer --nomodule',
  )
  console.error(
    "\nExample: csp-builder --update \"script-src:'self',cdn.example.com\" --nonce abc",
  )
}

export function main(): void {
  try {
    const options = getOptions()
    if (!COMMANDS.includes(options.command)) {
      printUsage()
      process.exit(1)
    } else {
      console.log(run(options, createLogger(options.verbose)))
    }
  } catch (error) {
    console.error(
      'Error:',
      error instanceof Error ? error.message : String(error),
    )
    process.exit(1)
  }
}

function isEntryModule(): boolean {
  const entry = process.argv[1]
  if (!entry) return false
  try {
    // npm links bin entries, so compare resolved paths
    return realpathSync(entry) === fileURLToPath(import.meta.url)
  } catch {
    return false
  }
}

// Only run main() if this is the entry module
if (isEntryModule()) {
  main()
}
