import {mkdtempSync, rmSync, writeFileSync} from 'fs'
import {tmpdir} from 'os'
import {join} from 'path'
import {afterEach, beforeEach, describe, expect, test} from 'vitest'
import {
  DEFAULT_CONFIG,
  fromSettings,
  headerName,
  loadSettingsFile,
  parseSettings,
  shouldReport,
} from '../src/config.js'
import {KNOWN_DIRECTIVES} from '../src/constants.js'
import {buildPolicy} from '../src/policy-builder.js'

describe('fromSettings', () => {
  test('should resolve the defaults', () => {
    const config = fromSettings()
    expect(Object.keys(config.directives)).toEqual([...KNOWN_DIRECTIVES])
    expect(config.directives['default-src']).toEqual(["'self'"])
    expect(config.directives['upgrade-insecure-requests']).toBe(false)
    expect(config.includeNonceIn).toEqual(['default-src'])
    expect(config.reportOnly).toBe(false)
    expect(config.reportPercentage).toBe(0)
  })

  test('should build the default policy', () => {
    expect(buildPolicy(fromSettings())).toBe("default-src 'self'")
    expect(buildPolicy(fromSettings(), undefined, undefined, 'abc')).toBe(
      "default-src 'self' 'nonce-abc'",
    )
  })

  test('should let user directives win and append unknown ones', () => {
    const config = fromSettings({
      directives: {
        'x-custom': 'value',
        'script-src': ["'self'"],
        'default-src': null,
      },
    })
    expect(Object.keys(config.directives).at(-1)).toBe('x-custom')
    expect(buildPolicy(config)).toBe("script-src 'self'; x-custom value")
  })

  test('should enable flag directives from settings', () => {
    const config = fromSettings({
      directives: {'upgrade-insecure-requests': true},
    })
    expect(buildPolicy(config)).toBe(
      "default-src 'self'; upgrade-insecure-requests",
    )
  })

  test('should copy user token lists and freeze the result', () => {
    const tokens = ["'self'"]
    const nonceIn = ['img-src']
    const config = fromSettings({
      directives: {'img-src': tokens},
      includeNonceIn: nonceIn,
      reportOnly: true,
      reportPercentage: 50,
    })
    tokens.push('cdn.example')
    nonceIn.push('script-src')

    expect(config.directives['img-src']).toEqual(["'self'"])
    expect(config.includeNonceIn).toEqual(['img-src'])
    expect(config.reportOnly).toBe(true)
    expect(config.reportPercentage).toBe(50)
    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.directives)).toBe(true)
  })

  test('should expose frozen defaults', () => {
    expect(DEFAULT_CONFIG).toEqual({
      includeNonceIn: ['default-src'],
      reportOnly: false,
      reportPercentage: 0,
    })
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true)
  })
})

describe('parseSettings', () => {
  test('should accept well-formed settings', () => {
    const settings = {
      directives: {
        'script-src': ["'self'", 'cdn.example'],
        'default-src': "'none'",
        'style-src': null,
        'upgrade-insecure-requests': true,
      },
      includeNonceIn: ['script-src'],
      reportOnly: true,
      reportPercentage: 25,
    }
    expect(parseSettings(settings)).toEqual(settings)
  })

  test('should accept an empty object', () => {
    expect(parseSettings({})).toEqual({})
  })

  test('should reject non-object settings', () => {
    expect(() => parseSettings([])).toThrow('Settings must be a JSON object')
    expect(() => parseSettings(null)).toThrow('Settings must be a JSON object')
  })

  test('should reject malformed directives', () => {
    expect(() => parseSettings({directives: []})).toThrow(
      'directives: must be an object',
    )
    expect(() =>
      parseSettings({directives: {'script-src': {a: 1}}}),
    ).toThrow(
      'directives.script-src: must be a token, a list of tokens or null',
    )
    expect(() => parseSettings({directives: {'img-src': [{}]}})).toThrow(
      'directives.img-src: must be a token, a list of tokens or null',
    )
  })

  test('should reject a malformed includeNonceIn', () => {
    expect(() => parseSettings({includeNonceIn: 'default-src'})).toThrow(
      'includeNonceIn: must be a list of directive names',
    )
    expect(() => parseSettings({includeNonceIn: ['default-src', 1]})).toThrow(
      'includeNonceIn.1: must be a directive name',
    )
  })

  test('should reject a non-boolean reportOnly', () => {
    expect(() => parseSettings({reportOnly: 'yes'})).toThrow(
      'reportOnly: must be a boolean',
    )
  })

  test.each([101, -1, 2.5, '50'])(
    'should reject reportPercentage %s',
    (reportPercentage) => {
      expect(() => parseSettings({reportPercentage})).toThrow(
        'reportPercentage: must be an integer between 0 and 100',
      )
    },
  )

  test('should drop unknown top-level keys', () => {
    expect(parseSettings({reportOnly: false, legacy: 1})).toEqual({
      reportOnly: false,
    })
  })
})

describe('loadSettingsFile', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'csp-builder-'))
  })

  afterEach(() => {
    rmSync(dir, {recursive: true, force: true})
  })

  test('should read and validate a JSON file', () => {
    const path = join(dir, 'settings.json')
    writeFileSync(
      path,
      JSON.stringify({directives: {'img-src': ["'self'"]}, reportOnly: true}),
    )
    expect(loadSettingsFile(path)).toEqual({
      directives: {'img-src': ["'self'"]},
      reportOnly: true,
    })
  })

  test('should report invalid JSON with the file path', () => {
    const path = join(dir, 'broken.json')
    writeFileSync(path, '{"directives":')
    expect(() => loadSettingsFile(path)).toThrow(
      `Invalid settings file ${path}:`,
    )
  })

  test('should report validation errors', () => {
    const path = join(dir, 'invalid.json')
    writeFileSync(path, JSON.stringify({reportOnly: 1}))
    expect(() => loadSettingsFile(path)).toThrow(
      'reportOnly: must be a boolean',
    )
  })
})

describe('headerName', () => {
  test('should pick the header from reportOnly', () => {
    expect(headerName({reportOnly: false})).toBe('Content-Security-Policy')
    expect(headerName({reportOnly: true})).toBe(
      'Content-Security-Policy-Report-Only',
    )
  })
})

describe('shouldReport', () => {
  test('should sample against reportPercentage', () => {
    expect(shouldReport({reportPercentage: 25}, () => 0.2)).toBe(true)
    expect(shouldReport({reportPercentage: 25}, () => 0.3)).toBe(false)
  })

  test('should never report at 0 and always at 100', () => {
    expect(shouldReport({reportPercentage: 0}, () => 0)).toBe(false)
    expect(shouldReport({reportPercentage: 100}, () => 0.999)).toBe(true)
  })
})
